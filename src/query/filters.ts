/**
 * Filter compiler for `filter[<entity>]=<field>[__<lookup>]=<value>,...`.
 *
 * The entity name is resolved to a relation path from the query root, the
 * field may carry further relation hops (`brand__name`), and the value is
 * coerced to boolean, integer or left as a string. Lookups are carried through
 * to the SQL layer as-is.
 */
import {
  type ColumnKind,
  type EntityKind,
  type RelationHop,
  columnKind,
  getRelation,
  splitPath,
  walkRelations,
} from "./schema";
import { type RelationPath, toRelationPath } from "./planner";
import { requireEntityPath, resolveRelationPath } from "./relationPaths";
import { InvalidPathError } from "../utils/errors";

export const LOOKUPS = [
  "exact",
  "iexact",
  "contains",
  "icontains",
  "startswith",
  "istartswith",
  "endswith",
  "iendswith",
  "gt",
  "gte",
  "lt",
  "lte",
  "in",
  "isnull",
] as const;

export type Lookup = (typeof LOOKUPS)[number];

export type FilterValue = boolean | number | string;

export interface FilterClause {
  path: RelationPath;
  column: string;
  columnKind: ColumnKind;
  lookup: Lookup;
  value: FilterValue | FilterValue[];
  /** The clause as written, for error messages */
  source: string;
}

export function isLookup(value: string): value is Lookup {
  return (LOOKUPS as readonly string[]).includes(value);
}

/**
 * `"true"`/`"false"` (any case) become booleans, plain decimal digits within
 * the safe integer range become integers, everything else stays a string for
 * the database to interpret.
 */
export function coerceFilterValue(raw: string): FilterValue {
  const lowered = raw.toLowerCase();
  if (lowered === "true") return true;
  if (lowered === "false") return false;
  if (/^[0-9]+$/.test(raw)) {
    // digits beyond 2^53 stay text so long SKUs and phone numbers match exactly
    const parsed = Number(raw);
    return Number.isSafeInteger(parsed) ? parsed : raw;
  }
  return raw;
}

function walkFieldRelations(
  entity: EntityKind,
  segments: readonly string[]
): RelationHop[] | undefined {
  const direct = walkRelations(entity, segments);
  if (direct || segments.length === 0) return direct;

  // first segment may name an entity instead of a relation (`customer__email`)
  const [first, ...rest] = segments;
  const canonical = resolveRelationPath(entity, first);
  if (!canonical) return undefined;
  const head = walkRelations(entity, canonical);
  const target = head?.[head.length - 1]?.relation.target;
  if (!head || !target) return undefined;
  const tail = walkRelations(target, rest);
  return tail ? [...head, ...tail] : undefined;
}

function compileClause(
  root: EntityKind,
  entityHops: readonly RelationHop[],
  field: string,
  rawValue: string,
  source: string
): FilterClause {
  const segments = splitPath(field);
  if (!segments || segments.length === 0) {
    throw new InvalidPathError(`Malformed filter field "${field}"`, field);
  }

  let lookup: Lookup = "exact";
  const last = segments[segments.length - 1];
  if (segments.length > 1 && isLookup(last)) {
    lookup = last;
    segments.pop();
  }

  const columnName = segments.pop();
  const entity = toRelationPath(root, entityHops).target;
  const fieldHops = walkFieldRelations(entity, segments);
  if (!columnName || !fieldHops) {
    throw new InvalidPathError(`Unknown filter field "${field}" on ${entity}`, field);
  }

  const path = toRelationPath(root, [...entityHops, ...fieldHops]);
  let column = columnName;
  let kind = columnKind(path.target, column);
  if (!kind) {
    // a to-one relation name filters on its key: `brand=3` means brand_id = 3
    const relation = getRelation(path.target, columnName);
    if (relation?.type === "belongsTo") {
      column = relation.localKey;
      kind = columnKind(path.target, column);
    }
  }
  if (!kind) {
    throw new InvalidPathError(`Unknown filter field "${field}" on ${entity}`, field);
  }

  const value =
    lookup === "in"
      ? rawValue.split("|").map(coerceFilterValue)
      : coerceFilterValue(rawValue);

  return { path, column, columnKind: kind, lookup, value, source };
}

/**
 * Compiles one `filter[<entityName>]` parameter. Clauses are separated by
 * commas and ANDed; a clause without `=` is skipped.
 */
export function compileFilterParam(
  root: EntityKind,
  entityName: string,
  rawValue: string
): FilterClause[] {
  const entityHops = requireEntityPath(root, entityName);
  const clauses: FilterClause[] = [];

  for (const expression of rawValue.split(",")) {
    const separator = expression.indexOf("=");
    if (separator === -1) continue;
    const field = expression.slice(0, separator).trim();
    const value = expression.slice(separator + 1);
    clauses.push(
      compileClause(root, entityHops, field, value, `filter[${entityName}]=${expression}`)
    );
  }

  return clauses;
}

export function compileFilters(
  root: EntityKind,
  filters: Readonly<Record<string, string>>
): FilterClause[] {
  return Object.entries(filters).flatMap(([entityName, value]) =>
    compileFilterParam(root, entityName, value)
  );
}
