import {
  type EntityKind,
  columnKind,
  entityDefinition,
  isToMany,
  splitPath,
  walkRelations,
} from "./schema";
import { type RelationPath, toRelationPath } from "./planner";
import { InvalidPathError } from "../utils/errors";

export type SortDirection = "asc" | "desc";

export interface OrderTerm {
  path: RelationPath;
  column: string;
  direction: SortDirection;
}

function parseOrderTerm(root: EntityKind, raw: string): OrderTerm {
  const direction: SortDirection = raw.startsWith("-") ? "desc" : "asc";
  const name = raw.replace(/^[-+]/, "");
  const segments = splitPath(name);
  const column = segments?.pop();
  if (!segments || !column) {
    throw new InvalidPathError(`Malformed ordering field "${raw}"`, raw);
  }

  const hops = walkRelations(root, segments);
  if (!hops) {
    throw new InvalidPathError(`Unknown ordering field "${raw}" on ${root}`, raw);
  }
  if (hops.some((hop) => isToMany(hop.relation))) {
    throw new InvalidPathError(
      `Cannot order ${root} by "${raw}": the path crosses a multi-valued relation`,
      raw
    );
  }

  const path = toRelationPath(root, hops);
  if (!columnKind(path.target, column)) {
    throw new InvalidPathError(`Unknown ordering field "${raw}" on ${root}`, raw);
  }
  return { path, column, direction };
}

/**
 * Parses `name,-created_at,brand__name` style ordering. With no fields the
 * entity's default ordering applies. Root `id` ascending always closes the
 * list so equal keys come back in a stable order.
 */
export function resolveOrdering(
  root: EntityKind,
  fields: readonly string[]
): OrderTerm[] {
  const source = fields.length > 0 ? fields : entityDefinition(root).ordering;
  const terms = source.map((field) => parseOrderTerm(root, field));

  const ordersById = terms.some(
    (term) => term.path.hops.length === 0 && term.column === "id"
  );
  if (!ordersById) {
    terms.push({ path: toRelationPath(root, []), column: "id", direction: "asc" });
  }
  return terms;
}
