/**
 * SQL composition for the related-query engine.
 *
 * Everything the caller controls reaches SQL either as a parameter or as an
 * identifier taken from the schema registry; table and column aliases are
 * positional (`t0`, `c0`) so request strings never become identifiers.
 */
import { type RawBuilder, sql } from "kysely";
import {
  type ColumnKind,
  type EntityKind,
  type RelationHop,
  columnNames,
  entityDefinition,
} from "./schema";
import type { BatchedLoad, RelationPath } from "./planner";
import type { FilterClause, FilterValue } from "./filters";
import type { OrderTerm } from "./ordering";
import { QueryError } from "../utils/errors";

export type Row = Record<string, unknown>;

export type JoinType = "left" | "inner";

export interface ColumnSelection {
  alias: string;
  column: string;
}

export interface TableLevel {
  pathKey: string;
  alias: string;
  kind: EntityKind;
  columns: ColumnSelection[];
}

export interface RootQueryInput {
  root: EntityKind;
  eager: readonly RelationPath[];
  filters: readonly FilterClause[];
  ordering: readonly OrderTerm[];
  distinct: boolean;
  limit?: number;
}

export interface RootQuery {
  query: RawBuilder<Row>;
  root: TableLevel;
  /** Eager levels keyed by relation path, parents before children */
  eager: Map<string, TableLevel>;
}

export interface BatchedLevel extends TableLevel {
  hop: RelationHop;
}

export interface BatchedQuery {
  query: RawBuilder<Row>;
  /** Column holding the key that links a row back to its owner */
  ownerAlias: string;
  levels: BatchedLevel[];
}

interface JoinedTable {
  alias: string;
  parentAlias: string;
  hop: RelationHop;
  type: JoinType;
}

class AliasAllocator {
  private tables = 0;
  private columns = 0;

  table(): string {
    return `t${this.tables++}`;
  }

  column(): string {
    return `c${this.columns++}`;
  }
}

const ref = (alias: string, column: string) => sql.ref(`${alias}.${column}`);

function selectLevel(
  aliases: AliasAllocator,
  pathKey: string,
  tableAlias: string,
  kind: EntityKind
): { level: TableLevel; selections: RawBuilder<unknown>[] } {
  const columns = columnNames(kind).map((column) => ({
    alias: aliases.column(),
    column,
  }));
  return {
    level: { pathKey, alias: tableAlias, kind, columns },
    selections: columns.map(
      ({ alias, column }) => sql`${ref(tableAlias, column)} as ${sql.id(alias)}`
    ),
  };
}

function joinClause(joined: JoinedTable): RawBuilder<unknown> {
  const { hop, alias, parentAlias, type } = joined;
  const table = entityDefinition(hop.relation.target).table;
  return sql`${sql.raw(type === "inner" ? "inner join" : "left join")} ${sql.table(table)} as ${sql.id(alias)} on ${ref(alias, hop.relation.foreignKey)} = ${ref(parentAlias, hop.relation.localKey)}`;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function bindValue(kind: ColumnKind, value: FilterValue): FilterValue {
  return kind === "text" && typeof value !== "string" ? String(value) : value;
}

function scalarValue(clause: FilterClause): FilterValue {
  if (Array.isArray(clause.value)) {
    throw new QueryError(`Lookup "${clause.lookup}" takes a single value in ${clause.source}`);
  }
  return clause.value;
}

/**
 * Turns one filter clause into a predicate on `target`. Pattern lookups
 * compare the text form of non-text columns.
 */
export function compilePredicate(
  target: RawBuilder<unknown>,
  clause: FilterClause
): RawBuilder<unknown> {
  const text = clause.columnKind === "text" ? target : sql`cast(${target} as text)`;
  const pattern = (prefix: string, suffix: string) =>
    `${prefix}${escapeLike(String(scalarValue(clause)))}${suffix}`;

  switch (clause.lookup) {
    case "exact":
      return sql`${target} = ${bindValue(clause.columnKind, scalarValue(clause))}`;
    case "iexact":
      return sql`${text} ilike ${pattern("", "")}`;
    case "contains":
      return sql`${text} like ${pattern("%", "%")}`;
    case "icontains":
      return sql`${text} ilike ${pattern("%", "%")}`;
    case "startswith":
      return sql`${text} like ${pattern("", "%")}`;
    case "istartswith":
      return sql`${text} ilike ${pattern("", "%")}`;
    case "endswith":
      return sql`${text} like ${pattern("%", "")}`;
    case "iendswith":
      return sql`${text} ilike ${pattern("%", "")}`;
    case "gt":
      return sql`${target} > ${bindValue(clause.columnKind, scalarValue(clause))}`;
    case "gte":
      return sql`${target} >= ${bindValue(clause.columnKind, scalarValue(clause))}`;
    case "lt":
      return sql`${target} < ${bindValue(clause.columnKind, scalarValue(clause))}`;
    case "lte":
      return sql`${target} <= ${bindValue(clause.columnKind, scalarValue(clause))}`;
    case "in": {
      const values = Array.isArray(clause.value) ? clause.value : [clause.value];
      return sql`${target} in (${sql.join(
        values.map((value) => bindValue(clause.columnKind, value))
      )})`;
    }
    case "isnull": {
      const value = scalarValue(clause);
      if (typeof value !== "boolean") {
        throw new QueryError(`isnull expects true or false in ${clause.source}`);
      }
      return value ? sql`${target} is null` : sql`${target} is not null`;
    }
  }
}

/**
 * Root query: the root table, every eager to-one join (left), the joins
 * filters need (inner, which may repeat root rows), ordering, distinct and
 * limit. All root and eager columns are selected under positional aliases.
 */
export function buildRootQuery(input: RootQueryInput): RootQuery {
  const aliases = new AliasAllocator();
  const rootAlias = aliases.table();
  const joins = new Map<string, JoinedTable>();

  const ensureJoined = (path: RelationPath, type: JoinType): string => {
    let parentAlias = rootAlias;
    path.hops.forEach((hop, index) => {
      const key = path.hops
        .slice(0, index + 1)
        .map((step) => step.name)
        .join("__");
      let joined = joins.get(key);
      if (!joined) {
        joined = { alias: aliases.table(), parentAlias, hop, type };
        joins.set(key, joined);
      }
      parentAlias = joined.alias;
    });
    return parentAlias;
  };

  const { level: root, selections } = selectLevel(aliases, "", rootAlias, input.root);
  const selected = new Set(root.columns.map(({ column }) => `${rootAlias}.${column}`));

  const eager = new Map<string, TableLevel>();
  for (const path of input.eager) {
    const alias = ensureJoined(path, "left");
    const { level, selections: levelSelections } = selectLevel(
      aliases,
      path.key,
      alias,
      path.target
    );
    eager.set(path.key, level);
    selections.push(...levelSelections);
    level.columns.forEach(({ column }) => selected.add(`${alias}.${column}`));
  }

  const predicates = input.filters.map((clause) =>
    compilePredicate(ref(ensureJoined(clause.path, "inner"), clause.column), clause)
  );

  const orderings = input.ordering.map((term) => {
    const alias = ensureJoined(term.path, "left");
    // distinct requires ordered expressions to be selected
    if (!selected.has(`${alias}.${term.column}`)) {
      selections.push(sql`${ref(alias, term.column)} as ${sql.id(aliases.column())}`);
      selected.add(`${alias}.${term.column}`);
    }
    return sql`${ref(alias, term.column)} ${sql.raw(term.direction)}`;
  });

  const parts: RawBuilder<unknown>[] = [
    sql`select${input.distinct ? sql` distinct` : sql``} ${sql.join(selections)}`,
    sql`from ${sql.table(entityDefinition(input.root).table)} as ${sql.id(rootAlias)}`,
    ...[...joins.values()].map(joinClause),
  ];
  if (predicates.length > 0) {
    parts.push(sql`where ${sql.join(predicates, sql` and `)}`);
  }
  if (orderings.length > 0) {
    parts.push(sql`order by ${sql.join(orderings)}`);
  }
  if (input.limit !== undefined) {
    parts.push(sql`limit ${sql.lit(input.limit)}`);
  }

  return { query: sql<Row>`${sql.join(parts, sql` `)}`, root, eager };
}

/**
 * Batched load for one to-many path: starts at the first to-many hop,
 * restricted to the owners' keys, and left-joins the remaining hops.
 */
export function buildBatchedQuery(
  load: BatchedLoad,
  ownerKeys: readonly unknown[]
): BatchedQuery {
  const [first, ...rest] = load.hops;
  if (!first) {
    throw new Error(`Batched load ${load.path.key} has no hops`);
  }
  if (ownerKeys.length === 0) {
    throw new Error(`Batched load ${load.path.key} needs at least one owner key`);
  }

  const aliases = new AliasAllocator();
  const baseAlias = aliases.table();
  const ownerAlias = aliases.column();
  const selections: RawBuilder<unknown>[] = [
    sql`${ref(baseAlias, first.relation.foreignKey)} as ${sql.id(ownerAlias)}`,
  ];
  const joinClauses: RawBuilder<unknown>[] = [];
  const levels: BatchedLevel[] = [];

  let pathKey = load.owner.key ? `${load.owner.key}__${first.name}` : first.name;
  const base = selectLevel(aliases, pathKey, baseAlias, first.relation.target);
  levels.push({ ...base.level, hop: first });
  selections.push(...base.selections);

  let parentAlias = baseAlias;
  for (const hop of rest) {
    const alias = aliases.table();
    pathKey = `${pathKey}__${hop.name}`;
    joinClauses.push(joinClause({ alias, parentAlias, hop, type: "left" }));
    const next = selectLevel(aliases, pathKey, alias, hop.relation.target);
    levels.push({ ...next.level, hop });
    selections.push(...next.selections);
    parentAlias = alias;
  }

  const orderings = [
    ...entityDefinition(first.relation.target).ordering.map((term) =>
      term.startsWith("-")
        ? sql`${ref(baseAlias, term.slice(1))} desc`
        : sql`${ref(baseAlias, term)} asc`
    ),
    ...levels.map((level) => sql`${ref(level.alias, "id")} asc`),
  ];

  const parts: RawBuilder<unknown>[] = [
    sql`select ${sql.join(selections)}`,
    sql`from ${sql.table(entityDefinition(first.relation.target).table)} as ${sql.id(baseAlias)}`,
    ...joinClauses,
    sql`where ${ref(baseAlias, first.relation.foreignKey)} in (${sql.join([...ownerKeys])})`,
    sql`order by ${sql.join(orderings)}`,
  ];

  return { query: sql<Row>`${sql.join(parts, sql` `)}`, ownerAlias, levels };
}
