/**
 * Entity/relationship registry for the related-query engine.
 *
 * Every queryable entity kind maps to its table, its columns (checked against
 * the Kysely table interfaces at compile time) and the relations that can be
 * traversed from it. Relation names are the segments callers write in
 * `join=`, `filter[...]` and `ordering=` paths.
 *
 * - `belongsTo`: this row holds the foreign key (`product.brand`)
 * - `hasMany`: target rows hold a key back to this row (`brand.products`)
 * - `hasOne`: like hasMany with at most one target row (`order.payment`)
 */
import type { DB } from "../types/db";

export const ENTITY_KINDS = [
  "brand",
  "category",
  "product",
  "warehouse",
  "stock",
  "customer",
  "order",
  "orderitem",
  "payment",
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export type ColumnKind = "integer" | "numeric" | "text" | "boolean" | "timestamp";

export type RelationType = "belongsTo" | "hasMany" | "hasOne";

export interface RelationDefinition {
  type: RelationType;
  target: EntityKind;
  /** Column on the side the relation is declared on */
  localKey: string;
  /** Column on the target side matched against `localKey` */
  foreignKey: string;
}

export interface RelationHop {
  source: EntityKind;
  name: string;
  relation: RelationDefinition;
}

const ENTITY_TABLES = {
  brand: "brands",
  category: "categories",
  product: "products",
  warehouse: "warehouses",
  stock: "stocks",
  customer: "customers",
  order: "orders",
  orderitem: "order_items",
  payment: "payments",
} as const satisfies Record<EntityKind, keyof DB>;

type TableOf<K extends EntityKind> = (typeof ENTITY_TABLES)[K];

interface EntityDefinition<K extends EntityKind> {
  table: TableOf<K>;
  columns: Record<keyof DB[TableOf<K>] & string, ColumnKind>;
  relations: Record<string, RelationDefinition>;
  /** Ordering used when the caller gives none */
  ordering: readonly string[];
  /** Relations loaded by the plain list endpoint */
  defaultJoins: readonly string[];
  /** Loaded with the default joins for derived fields, left out of the output */
  aggregateJoins: readonly string[];
}

export interface EntityDescriptor {
  kind: EntityKind;
  table: keyof DB;
  columns: Readonly<Record<string, ColumnKind>>;
  relations: Readonly<Record<string, RelationDefinition>>;
  ordering: readonly string[];
  defaultJoins: readonly string[];
  aggregateJoins: readonly string[];
}

const belongsTo = (target: EntityKind, localKey: string): RelationDefinition => ({
  type: "belongsTo",
  target,
  localKey,
  foreignKey: "id",
});

const hasMany = (target: EntityKind, foreignKey: string): RelationDefinition => ({
  type: "hasMany",
  target,
  localKey: "id",
  foreignKey,
});

const hasOne = (target: EntityKind, foreignKey: string): RelationDefinition => ({
  type: "hasOne",
  target,
  localKey: "id",
  foreignKey,
});

const ENTITIES: { [K in EntityKind]: EntityDefinition<K> } = {
  brand: {
    table: ENTITY_TABLES.brand,
    columns: {
      id: "integer",
      name: "text",
      is_active: "boolean",
      created_at: "timestamp",
    },
    relations: {
      products: hasMany("product", "brand_id"),
    },
    ordering: ["name"],
    defaultJoins: [],
    aggregateJoins: ["products"],
  },
  category: {
    table: ENTITY_TABLES.category,
    columns: {
      id: "integer",
      name: "text",
      is_active: "boolean",
      created_at: "timestamp",
    },
    relations: {
      products: hasMany("product", "category_id"),
    },
    ordering: ["name"],
    defaultJoins: [],
    aggregateJoins: ["products"],
  },
  product: {
    table: ENTITY_TABLES.product,
    columns: {
      id: "integer",
      name: "text",
      sku: "text",
      price: "numeric",
      is_active: "boolean",
      brand_id: "integer",
      category_id: "integer",
      created_at: "timestamp",
    },
    relations: {
      brand: belongsTo("brand", "brand_id"),
      category: belongsTo("category", "category_id"),
      stocks: hasMany("stock", "product_id"),
      order_items: hasMany("orderitem", "product_id"),
    },
    ordering: ["name"],
    defaultJoins: ["brand", "category", "stocks__warehouse"],
    aggregateJoins: [],
  },
  warehouse: {
    table: ENTITY_TABLES.warehouse,
    columns: {
      id: "integer",
      name: "text",
      city: "text",
      created_at: "timestamp",
    },
    relations: {
      stocks: hasMany("stock", "warehouse_id"),
    },
    ordering: ["city", "name"],
    defaultJoins: [],
    aggregateJoins: ["stocks"],
  },
  stock: {
    table: ENTITY_TABLES.stock,
    columns: {
      id: "integer",
      product_id: "integer",
      warehouse_id: "integer",
      qty: "integer",
      reserved: "integer",
      updated_at: "timestamp",
      created_at: "timestamp",
    },
    relations: {
      product: belongsTo("product", "product_id"),
      warehouse: belongsTo("warehouse", "warehouse_id"),
    },
    ordering: ["id"],
    defaultJoins: ["product__brand", "product__category", "warehouse"],
    aggregateJoins: [],
  },
  customer: {
    table: ENTITY_TABLES.customer,
    columns: {
      id: "integer",
      full_name: "text",
      email: "text",
      created_at: "timestamp",
    },
    relations: {
      orders: hasMany("order", "customer_id"),
    },
    ordering: ["full_name"],
    defaultJoins: ["orders__items__product"],
    aggregateJoins: ["orders__payment"],
  },
  order: {
    table: ENTITY_TABLES.order,
    columns: {
      id: "integer",
      customer_id: "integer",
      status: "text",
      created_at: "timestamp",
    },
    relations: {
      customer: belongsTo("customer", "customer_id"),
      items: hasMany("orderitem", "order_id"),
      payment: hasOne("payment", "order_id"),
    },
    ordering: ["-created_at"],
    defaultJoins: ["customer", "items__product", "payment"],
    aggregateJoins: [],
  },
  orderitem: {
    table: ENTITY_TABLES.orderitem,
    columns: {
      id: "integer",
      order_id: "integer",
      product_id: "integer",
      qty: "integer",
      unit_price: "numeric",
      created_at: "timestamp",
    },
    relations: {
      order: belongsTo("order", "order_id"),
      product: belongsTo("product", "product_id"),
    },
    ordering: ["id"],
    defaultJoins: ["order__customer", "product__brand", "product__category"],
    aggregateJoins: [],
  },
  payment: {
    table: ENTITY_TABLES.payment,
    columns: {
      id: "integer",
      order_id: "integer",
      method: "text",
      amount: "numeric",
      status: "text",
      created_at: "timestamp",
    },
    relations: {
      order: belongsTo("order", "order_id"),
    },
    ordering: ["-created_at"],
    defaultJoins: ["order__customer"],
    aggregateJoins: [],
  },
};

export function isEntityKind(value: string): value is EntityKind {
  return (ENTITY_KINDS as readonly string[]).includes(value);
}

/**
 * `orderItem`, `order_item` and `order-item` all name the same kind.
 */
export function normalizeEntityName(name: string): string {
  return name.trim().toLowerCase().replace(/[_-]/g, "");
}

export function toEntityKind(name: string): EntityKind | undefined {
  const normalized = normalizeEntityName(name);
  return isEntityKind(normalized) ? normalized : undefined;
}

export function entityDefinition(kind: EntityKind): EntityDescriptor {
  const definition: Omit<EntityDescriptor, "kind"> = ENTITIES[kind];
  return { kind, ...definition };
}

export function columnKind(kind: EntityKind, column: string): ColumnKind | undefined {
  const { columns } = entityDefinition(kind);
  return Object.hasOwn(columns, column) ? columns[column] : undefined;
}

export function columnNames(kind: EntityKind): string[] {
  return Object.keys(ENTITIES[kind].columns);
}

export function getRelation(
  kind: EntityKind,
  name: string
): RelationDefinition | undefined {
  const { relations } = entityDefinition(kind);
  return Object.hasOwn(relations, name) ? relations[name] : undefined;
}

export function isToMany(relation: RelationDefinition): boolean {
  return relation.type === "hasMany";
}

/**
 * Splits `a.b__c` into `["a", "b", "c"]`. Returns undefined for empty
 * segments such as `a..b`.
 */
export function splitPath(raw: string): string[] | undefined {
  const trimmed = raw.trim();
  if (trimmed === "") return [];
  const segments = trimmed.split(/__|\./).map((segment) => segment.trim());
  return segments.some((segment) => segment === "") ? undefined : segments;
}

/**
 * Walks relation names from `root`. Returns undefined as soon as a segment is
 * not a relation of the entity reached so far.
 */
export function walkRelations(
  root: EntityKind,
  segments: readonly string[]
): RelationHop[] | undefined {
  const hops: RelationHop[] = [];
  let current = root;
  for (const name of segments) {
    const relation = getRelation(current, name);
    if (!relation) return undefined;
    hops.push({ source: current, name, relation });
    current = relation.target;
  }
  return hops;
}

export function pathTarget(root: EntityKind, hops: readonly RelationHop[]): EntityKind {
  const last = hops[hops.length - 1];
  return last ? last.relation.target : root;
}

function assertRegistryConsistency() {
  for (const kind of ENTITY_KINDS) {
    for (const [name, relation] of Object.entries(ENTITIES[kind].relations)) {
      if (!columnKind(kind, relation.localKey)) {
        throw new Error(`${kind}.${name}: unknown local key ${relation.localKey}`);
      }
      if (!columnKind(relation.target, relation.foreignKey)) {
        throw new Error(
          `${kind}.${name}: unknown foreign key ${relation.target}.${relation.foreignKey}`
        );
      }
    }
    for (const term of ENTITIES[kind].ordering) {
      if (!columnKind(kind, term.replace(/^-/, ""))) {
        throw new Error(`${kind}: unknown default ordering column ${term}`);
      }
    }
  }
}

assertRegistryConsistency();
