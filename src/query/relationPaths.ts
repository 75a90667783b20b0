import { z } from "zod";
import rawRelationPaths from "./relation-paths.json";
import {
  type EntityKind,
  type RelationHop,
  isEntityKind,
  pathTarget,
  splitPath,
  toEntityKind,
  walkRelations,
} from "./schema";
import { InvalidPathError } from "../utils/errors";

type RelationPathTable = ReadonlyMap<EntityKind, ReadonlyMap<EntityKind, readonly string[]>>;

const relationPathTableSchema = z.record(
  z.string(),
  z.record(z.string(), z.string().min(1))
);

/**
 * Loads the canonical `(source, target) → path` table and checks every entry
 * walks the schema graph to its target. A broken entry stops the module from
 * loading instead of surfacing mid-request.
 */
export function loadRelationPathTable(raw: unknown): RelationPathTable {
  const parsed = relationPathTableSchema.parse(raw);
  const table = new Map<EntityKind, Map<EntityKind, readonly string[]>>();

  for (const [source, targets] of Object.entries(parsed)) {
    if (!isEntityKind(source)) {
      throw new Error(`relation paths: unknown source entity "${source}"`);
    }
    const entries = new Map<EntityKind, readonly string[]>();
    for (const [target, path] of Object.entries(targets)) {
      if (!isEntityKind(target)) {
        throw new Error(`relation paths: unknown target entity "${target}" under ${source}`);
      }
      const segments = splitPath(path);
      const hops = segments ? walkRelations(source, segments) : undefined;
      if (!segments || !hops || hops.length === 0 || pathTarget(source, hops) !== target) {
        throw new Error(`relation paths: ${source} -> ${target} via "${path}" does not reach ${target}`);
      }
      entries.set(target, segments);
    }
    table.set(source, entries);
  }

  return table;
}

const RELATION_PATHS = loadRelationPathTable(rawRelationPaths);

/**
 * Canonical relation path from `source` to the entity called `targetName`, or
 * undefined when the table has no entry for the pair.
 */
export function resolveRelationPath(
  source: EntityKind,
  targetName: string
): readonly string[] | undefined {
  const target = toEntityKind(targetName);
  if (!target) return undefined;
  return RELATION_PATHS.get(source)?.get(target);
}

/**
 * Hops from `source` to the entity named `name`: none for the source itself,
 * the table path for a known pair, otherwise `name` read as a raw relation
 * path (`stocks`, `order_items__order`). Undefined when nothing walks.
 */
export function resolveEntityPath(
  source: EntityKind,
  name: string
): RelationHop[] | undefined {
  if (toEntityKind(name) === source) return [];

  const canonical = resolveRelationPath(source, name);
  if (canonical) return walkRelations(source, canonical);

  const segments = splitPath(name);
  if (!segments || segments.length === 0) return undefined;
  return walkRelations(source, segments);
}

export function requireEntityPath(source: EntityKind, name: string): RelationHop[] {
  const hops = resolveEntityPath(source, name);
  if (!hops) {
    throw new InvalidPathError(`Cannot resolve "${name}" from ${source}`, name);
  }
  return hops;
}

export function formatPath(hops: readonly RelationHop[]): string {
  return hops.map((hop) => hop.name).join(".");
}
