import type { Kysely } from "kysely";
import { getSQLClient } from "../db";
import type { DB } from "../types/db";
import { type EntityKind, entityDefinition } from "../query/schema";
import { planJoins } from "../query/planner";
import { compileFilterParam, compileFilters } from "../query/filters";
import { resolveOrdering } from "../query/ordering";
import { executeRelatedQuery } from "../query/executor";
import { type Projected, defaultRepresentation, projectNodes } from "../query/projection";
import type { RelatedParams } from "../validations/related";
import { NotFoundError } from "../utils/errors";

export interface RelatedResponse {
  count: number;
  results: Projected[];
  /** SQL of the root query, for diagnostics only */
  sql_query: string;
  batched_queries: string[];
}

/**
 * Joins, filters, orders and projects `root` rows as the request asks.
 */
export async function getRelated(
  root: EntityKind,
  params: RelatedParams,
  db: Kysely<DB> = getSQLClient()
): Promise<RelatedResponse> {
  const plan = planJoins(root, params.join);
  const filters = compileFilters(root, params.filters);
  const ordering = resolveOrdering(root, params.ordering);

  const { nodes, sql, batchedSql } = await executeRelatedQuery(db, {
    root,
    plan,
    filters,
    ordering,
    distinct: params.distinct,
    limit: params.limit,
  });
  const results = projectNodes(root, nodes, params.fields);

  return {
    count: results.length,
    results,
    sql_query: sql,
    batched_queries: batchedSql,
  };
}

/** Path keys of `paths` and of every prefix they pass through */
function pathKeys(paths: readonly string[]): Set<string> {
  const keys = new Set<string>();
  for (const path of paths) {
    const segments = path.split("__");
    segments.forEach((_, index) => keys.add(segments.slice(0, index + 1).join("__")));
  }
  return keys;
}

/**
 * Default joins plus the aggregate joins derived fields need. Aggregate-only
 * paths come back as `hidden` so the representation leaves them out.
 */
function defaultView(root: EntityKind) {
  const { defaultJoins, aggregateJoins } = entityDefinition(root);
  const shown = pathKeys(defaultJoins);
  const hidden = new Set([...pathKeys(aggregateJoins)].filter((key) => !shown.has(key)));
  return { plan: planJoins(root, [...defaultJoins, ...aggregateJoins]), hidden };
}

/**
 * Every row of `root` with its default relations, in default order.
 */
export async function listEntities(
  root: EntityKind,
  db: Kysely<DB> = getSQLClient()
): Promise<Projected[]> {
  const { plan, hidden } = defaultView(root);
  const { nodes } = await executeRelatedQuery(db, {
    root,
    plan,
    filters: [],
    ordering: resolveOrdering(root, []),
    distinct: false,
  });
  return nodes.map((node) => defaultRepresentation(node, hidden));
}

export async function findEntity(
  root: EntityKind,
  id: number,
  db: Kysely<DB> = getSQLClient()
): Promise<Projected> {
  const { plan, hidden } = defaultView(root);
  const { nodes } = await executeRelatedQuery(db, {
    root,
    plan,
    filters: compileFilterParam(root, root, `id=${id}`),
    ordering: resolveOrdering(root, []),
    distinct: false,
  });
  const [node] = nodes;
  if (!node) {
    throw new NotFoundError(`${root} ${id} not found`, root, id);
  }
  return defaultRepresentation(node, hidden);
}

/**
 * Rows of `root` matching one `filter[...]` style clause list, with default
 * relations. Backs the per-entity listing actions (`/brands/:id/products`).
 */
export async function listWhere(
  root: EntityKind,
  clauses: string,
  db: Kysely<DB> = getSQLClient()
): Promise<Projected[]> {
  const { plan, hidden } = defaultView(root);
  const { nodes } = await executeRelatedQuery(db, {
    root,
    plan,
    filters: compileFilterParam(root, root, clauses),
    ordering: resolveOrdering(root, []),
    distinct: false,
  });
  return nodes.map((node) => defaultRepresentation(node, hidden));
}
