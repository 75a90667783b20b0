import {
  type EntityKind,
  type RelationHop,
  isToMany,
  pathTarget,
  splitPath,
  walkRelations,
} from "./schema";
import { InvalidPathError } from "../utils/errors";

export interface RelationPath {
  /** Relation names joined with `__`; the root itself is "" */
  key: string;
  hops: readonly RelationHop[];
  target: EntityKind;
}

/**
 * A path with at least one to-many hop. Its `owner` prefix (to-one hops only)
 * is joined eagerly; the load itself starts at the first to-many hop.
 */
export interface BatchedLoad {
  path: RelationPath;
  owner: RelationPath;
  hops: readonly RelationHop[];
}

export interface JoinPlan {
  root: EntityKind;
  eager: RelationPath[];
  batched: BatchedLoad[];
}

export function toRelationPath(
  root: EntityKind,
  hops: readonly RelationHop[]
): RelationPath {
  return {
    key: hops.map((hop) => hop.name).join("__"),
    hops,
    target: pathTarget(root, hops),
  };
}

/**
 * Walks a `.`/`__` separated relation path, rejecting unknown segments.
 */
export function parseRelationPath(root: EntityKind, raw: string): RelationPath {
  const segments = splitPath(raw);
  if (!segments) {
    throw new InvalidPathError(`Malformed relation path "${raw}"`, raw);
  }
  const hops = walkRelations(root, segments);
  if (!hops) {
    throw new InvalidPathError(`Unknown relation path "${raw}" on ${root}`, raw);
  }
  return toRelationPath(root, hops);
}

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

/**
 * Partitions requested relation paths into eager joins (every hop to-one) and
 * batched loads (some hop to-many). The first to-many hop turns the whole
 * path into a batched load; the to-one hops before it become eager joins so
 * the owner rows are available once the root query returns.
 */
export function planJoins(root: EntityKind, rawPaths: readonly string[]): JoinPlan {
  const eager = new Map<string, RelationPath>();
  const batched = new Map<string, BatchedLoad>();

  const addEager = (hops: readonly RelationHop[]) => {
    for (let length = 1; length <= hops.length; length++) {
      const prefix = toRelationPath(root, hops.slice(0, length));
      if (!eager.has(prefix.key)) {
        eager.set(prefix.key, prefix);
      }
    }
  };

  for (const raw of rawPaths) {
    const path = parseRelationPath(root, raw);
    if (path.hops.length === 0) continue;

    const firstToMany = path.hops.findIndex((hop) => isToMany(hop.relation));
    if (firstToMany === -1) {
      addEager(path.hops);
      continue;
    }

    const ownerHops = path.hops.slice(0, firstToMany);
    addEager(ownerHops);
    if (!batched.has(path.key)) {
      batched.set(path.key, {
        path,
        owner: toRelationPath(root, ownerHops),
        hops: path.hops.slice(firstToMany),
      });
    }
  }

  return {
    root,
    eager: [...eager.values()],
    batched: [...batched.values()],
  };
}
