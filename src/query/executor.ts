import type { Kysely, RawBuilder } from "kysely";
import type { DB } from "../types/db";
import {
  type EntityKind,
  type RelationHop,
  entityDefinition,
  isToMany,
} from "./schema";
import type { BatchedLoad, JoinPlan } from "./planner";
import type { FilterClause } from "./filters";
import type { OrderTerm } from "./ordering";
import {
  type Row,
  type TableLevel,
  buildBatchedQuery,
  buildRootQuery,
} from "./sqlBuilder";
import { QueryError, pgErrorCode } from "../utils/errors";
import { queryLogger } from "../utils/logger";

export type RelationValue = EntityNode | EntityNode[] | null;

export interface EntityNode {
  kind: EntityKind;
  values: Record<string, unknown>;
  relations: Record<string, RelationValue>;
}

export interface RelatedQuery {
  root: EntityKind;
  plan: JoinPlan;
  filters: readonly FilterClause[];
  ordering: readonly OrderTerm[];
  distinct: boolean;
  limit?: number;
}

export interface RelatedQueryResult {
  nodes: EntityNode[];
  /** Root query SQL */
  sql: string;
  /** One entry per batched query actually issued */
  batchedSql: string[];
}

function nodeFromRow(level: TableLevel, row: Row): EntityNode {
  const values: Record<string, unknown> = {};
  for (const { alias, column } of level.columns) {
    values[column] = row[alias];
  }
  return { kind: level.kind, values, relations: {} };
}

function idOf(level: TableLevel, row: Row): unknown {
  const id = level.columns.find(({ column }) => column === "id");
  return id ? row[id.alias] : undefined;
}

function emptyRelation(hop: RelationHop): RelationValue {
  return isToMany(hop.relation) ? [] : null;
}

async function run(db: Kysely<DB>, query: RawBuilder<Row>) {
  const compiled = query.compile(db);
  queryLogger.debug({ sql: compiled.sql, parameters: compiled.parameters }, "related query");
  try {
    const { rows } = await db.executeQuery(compiled);
    return { sql: compiled.sql, rows };
  } catch (error) {
    // data exceptions (22xxx) and syntax/type errors (42xxx) come from request input
    const code = pgErrorCode(error);
    if (code && (code.startsWith("22") || code.startsWith("42"))) {
      throw new QueryError(error instanceof Error ? error.message : String(error));
    }
    throw error;
  }
}

function hydrateRoot(
  row: Row,
  root: TableLevel,
  eager: ReadonlyMap<string, TableLevel>,
  plan: JoinPlan
): EntityNode {
  const rootNode = nodeFromRow(root, row);
  const byPath = new Map<string, EntityNode | null>([["", rootNode]]);

  for (const path of plan.eager) {
    const level = eager.get(path.key);
    const hop = path.hops[path.hops.length - 1];
    const parentKey = path.hops
      .slice(0, -1)
      .map((step) => step.name)
      .join("__");
    const parent = byPath.get(parentKey);
    if (!level || !hop || !parent) {
      byPath.set(path.key, null);
      continue;
    }

    const id = idOf(level, row);
    const node = id === null || id === undefined ? null : nodeFromRow(level, row);
    parent.relations[hop.name] = node;
    byPath.set(path.key, node);
  }

  return rootNode;
}

/** Follows eager to-one relations from a root node to the owner of a batched load */
function ownerNode(node: EntityNode, load: BatchedLoad): EntityNode | null {
  let current: EntityNode | null = node;
  for (const hop of load.owner.hops) {
    const next: RelationValue | undefined = current.relations[hop.name];
    if (!next || Array.isArray(next)) return null;
    current = next;
  }
  return current;
}

/**
 * Child lookup per parent node so rows for the same child merge into one
 * node, including children attached by an earlier batched load.
 */
class ChildIndex {
  private readonly index = new Map<EntityNode, Map<string, EntityNode>>();

  find(parent: EntityNode, relation: string, id: unknown): EntityNode | undefined {
    return this.children(parent).get(`${relation}/${String(id)}`);
  }

  add(parent: EntityNode, relation: string, child: EntityNode) {
    this.children(parent).set(`${relation}/${String(child.values.id)}`, child);
  }

  private children(parent: EntityNode): Map<string, EntityNode> {
    let children = this.index.get(parent);
    if (!children) {
      children = new Map();
      for (const [relation, value] of Object.entries(parent.relations)) {
        const nodes = Array.isArray(value) ? value : value ? [value] : [];
        nodes.forEach((child) => children?.set(`${relation}/${String(child.values.id)}`, child));
      }
      this.index.set(parent, children);
    }
    return children;
  }
}

function attach(
  index: ChildIndex,
  parent: EntityNode,
  hop: RelationHop,
  level: TableLevel,
  row: Row
): EntityNode | undefined {
  const id = idOf(level, row);
  if (id === null || id === undefined) return undefined;

  const existing = index.find(parent, hop.name, id);
  if (existing) return existing;

  const node = nodeFromRow(level, row);
  const current = parent.relations[hop.name];
  if (Array.isArray(current)) {
    current.push(node);
  } else if (isToMany(hop.relation)) {
    parent.relations[hop.name] = [node];
  } else {
    parent.relations[hop.name] = node;
  }
  index.add(parent, hop.name, node);
  return node;
}

async function runBatchedLoad(
  db: Kysely<DB>,
  load: BatchedLoad,
  roots: readonly EntityNode[],
  index: ChildIndex
): Promise<string | undefined> {
  const [first] = load.hops;
  if (!first) return undefined;

  const owners = new Map<string, EntityNode[]>();
  for (const root of roots) {
    const owner = ownerNode(root, load);
    if (!owner) continue;
    if (!(first.name in owner.relations)) {
      owner.relations[first.name] = emptyRelation(first);
    }
    const key = owner.values[first.relation.localKey];
    if (key === null || key === undefined) continue;
    const group = owners.get(String(key));
    if (group) {
      group.push(owner);
    } else {
      owners.set(String(key), [owner]);
    }
  }

  const ownerKeys = [...owners.values()].map(
    ([owner]) => owner?.values[first.relation.localKey]
  );
  if (ownerKeys.length === 0) return undefined;

  const batched = buildBatchedQuery(load, ownerKeys);
  const { sql, rows } = await run(db, batched.query);

  for (const row of rows) {
    for (const owner of owners.get(String(row[batched.ownerAlias])) ?? []) {
      let parent: EntityNode | undefined = owner;
      for (let depth = 0; parent && depth < batched.levels.length; depth++) {
        const level = batched.levels[depth];
        const child = attach(index, parent, level.hop, level, row);
        const next = batched.levels[depth + 1];
        if (child && next && !(next.hop.name in child.relations)) {
          child.relations[next.hop.name] = emptyRelation(next.hop);
        }
        parent = child;
      }
    }
  }

  return sql;
}

/**
 * Runs the root query, hydrates eager to-one relations from its rows, then
 * issues one batched query per to-many path and merges the results into the
 * owning nodes.
 */
export async function executeRelatedQuery(
  db: Kysely<DB>,
  query: RelatedQuery
): Promise<RelatedQueryResult> {
  const root = buildRootQuery({
    root: query.root,
    eager: query.plan.eager,
    filters: query.filters,
    ordering: query.ordering,
    distinct: query.distinct,
    limit: query.limit,
  });
  const { sql, rows } = await run(db, root.query);
  const nodes = rows.map((row) => hydrateRoot(row, root.root, root.eager, query.plan));

  const index = new ChildIndex();
  const batchedSql: string[] = [];
  for (const load of query.plan.batched) {
    const issued = await runBatchedLoad(db, load, nodes, index);
    if (issued) batchedSql.push(issued);
  }

  queryLogger.debug(
    {
      root: query.root,
      table: entityDefinition(query.root).table,
      rows: nodes.length,
      queries: 1 + batchedSql.length,
    },
    "related query complete"
  );
  return { nodes, sql, batchedSql };
}
