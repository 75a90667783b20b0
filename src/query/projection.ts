import {
  type EntityKind,
  type RelationHop,
  columnKind,
  isToMany,
  toEntityKind,
} from "./schema";
import type { EntityNode, RelationValue } from "./executor";
import { resolveEntityPath } from "./relationPaths";

export type Projected = Record<string, unknown>;

/** Requested fields keyed by entity name as the caller wrote it */
export type FieldWhitelist = ReadonlyMap<string, readonly string[]>;

type DerivedField = (node: EntityNode) => number | undefined;

const toNumber = (value: unknown) => (typeof value === "number" ? value : Number(value));

export const roundMoney = (value: number) => Math.round(value * 100) / 100;

const loaded = (node: EntityNode, relation: string): EntityNode[] | undefined => {
  const value = node.relations[relation];
  return Array.isArray(value) ? value : undefined;
};

const itemTotal = (item: EntityNode) =>
  roundMoney(toNumber(item.values.qty) * toNumber(item.values.unit_price));

const countActiveProducts: DerivedField = (node) =>
  loaded(node, "products")?.filter((product) => product.values.is_active === true).length;

// Aggregates over relations are only emitted when the relation was loaded
const DERIVED_FIELDS: { [K in EntityKind]: Record<string, DerivedField> } = {
  brand: { products_count: countActiveProducts },
  category: { products_count: countActiveProducts },
  product: {
    total_stock: (node) =>
      loaded(node, "stocks")?.reduce((sum, stock) => sum + toNumber(stock.values.qty), 0),
  },
  warehouse: {
    total_products: (node) =>
      loaded(node, "stocks")?.filter((stock) => toNumber(stock.values.qty) > 0).length,
  },
  stock: {
    available_qty: (node) => toNumber(node.values.qty) - toNumber(node.values.reserved),
  },
  customer: {
    orders_count: (node) => loaded(node, "orders")?.length,
    total_spent: (node) => {
      const orders = loaded(node, "orders");
      if (!orders || orders.some((order) => !("payment" in order.relations))) return undefined;
      return roundMoney(
        orders.reduce((sum, order) => {
          const payment = order.relations.payment;
          return payment && !Array.isArray(payment) && payment.values.status === "CONFIRMED"
            ? sum + toNumber(payment.values.amount)
            : sum;
        }, 0)
      );
    },
  },
  order: {
    total_amount: (node) => {
      const items = loaded(node, "items");
      return items && roundMoney(items.reduce((sum, item) => sum + itemTotal(item), 0));
    },
    total_items: (node) =>
      loaded(node, "items")?.reduce((sum, item) => sum + toNumber(item.values.qty), 0),
  },
  orderitem: {
    total_price: itemTotal,
  },
  payment: {},
};

export function derivedFields(node: EntityNode): Projected {
  const result: Projected = {};
  for (const [name, compute] of Object.entries(DERIVED_FIELDS[node.kind])) {
    const value = compute(node);
    if (value !== undefined) result[name] = value;
  }
  return result;
}

function fieldValue(node: EntityNode, field: string): unknown {
  if (columnKind(node.kind, field)) return node.values[field];
  const derived = Object.hasOwn(DERIVED_FIELDS[node.kind], field)
    ? DERIVED_FIELDS[node.kind][field]
    : undefined;
  return derived?.(node);
}

/**
 * Columns, derived fields and every loaded relation, nested the same way.
 * Relation paths in `hidden` (`orders__payment`) are loaded but not rendered.
 */
export function defaultRepresentation(
  node: EntityNode,
  hidden: ReadonlySet<string> = new Set(),
  prefix = ""
): Projected {
  const result: Projected = { ...node.values, ...derivedFields(node) };
  for (const [name, value] of Object.entries(node.relations)) {
    const key = prefix ? `${prefix}__${name}` : name;
    if (hidden.has(key)) continue;
    result[name] = representRelation(value, hidden, key);
  }
  return result;
}

function representRelation(
  value: RelationValue,
  hidden: ReadonlySet<string>,
  key: string
): unknown {
  if (Array.isArray(value)) return value.map((node) => defaultRepresentation(node, hidden, key));
  return value ? defaultRepresentation(value, hidden, key) : null;
}

/**
 * Only the listed fields, in the order given. Names that are neither a column
 * nor a derived field of the entity are skipped.
 */
export function pickFields(node: EntityNode, fields: readonly string[]): Projected {
  const result: Projected = {};
  for (const field of fields) {
    const value = fieldValue(node, field);
    if (value !== undefined) result[field] = value;
  }
  return result;
}

/** Nodes reached along `hops`, or undefined when some hop was not loaded */
function collectAlong(
  node: EntityNode,
  hops: readonly RelationHop[]
): EntityNode[] | undefined {
  let frontier = [node];
  for (const hop of hops) {
    const next: EntityNode[] = [];
    for (const current of frontier) {
      const value = current.relations[hop.name];
      if (value === undefined) return undefined;
      if (Array.isArray(value)) next.push(...value);
      else if (value) next.push(value);
    }
    frontier = next;
  }
  return frontier;
}

function dedupeById(nodes: readonly EntityNode[]): EntityNode[] {
  const seen = new Set<string>();
  return nodes.filter((node) => {
    const key = String(node.values.id);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function projectNode(
  root: EntityKind,
  node: EntityNode,
  whitelist: FieldWhitelist
): Projected {
  const entries = [...whitelist.entries()];
  const rootEntry = entries.find(([name]) => toEntityKind(name) === root);
  const result = rootEntry ? pickFields(node, rootEntry[1]) : defaultRepresentation(node);

  for (const [name, fields] of entries) {
    if (toEntityKind(name) === root) continue;
    const hops = resolveEntityPath(root, name);
    if (!hops || hops.length === 0) continue;
    const reached = collectAlong(node, hops);
    if (!reached) continue;

    if (hops.some((hop) => isToMany(hop.relation))) {
      result[name] = dedupeById(reached).map((related) => pickFields(related, fields));
    } else {
      const [related] = reached;
      result[name] = related ? pickFields(related, fields) : null;
    }
  }

  return result;
}

export function projectNodes(
  root: EntityKind,
  nodes: readonly EntityNode[],
  whitelist: FieldWhitelist
): Projected[] {
  return nodes.map((node) => projectNode(root, node, whitelist));
}
