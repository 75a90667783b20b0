import { z } from "zod";
import { splitList } from "../query/planner";

// repeated parameters arrive as arrays; they are read as one comma list
const ZQueryText = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join(",") : value));

const ZBracketed = z.record(z.string(), ZQueryText);

export const ZRelatedQuery = z
  .object({
    join: ZQueryText.optional(),
    ordering: ZQueryText.optional(),
    distinct: ZQueryText.optional(),
    limit: ZQueryText.optional(),
    filter: ZBracketed.optional(),
    fields: ZBracketed.optional(),
  })
  .passthrough();

export interface RelatedParams {
  join: string[];
  /** Raw clause lists keyed by entity name */
  filters: Record<string, string>;
  fields: Map<string, string[]>;
  ordering: string[];
  distinct: boolean;
  limit?: number;
}

/**
 * `filter[brand]=...` reaches us either nested (`{ filter: { brand } }`, the
 * Express query parser) or as a flat key when bracket parsing is off.
 */
function bracketed(
  nested: Record<string, string> | undefined,
  query: Record<string, unknown>,
  prefix: string
): Map<string, string> {
  const result = new Map<string, string>(Object.entries(nested ?? {}));
  const pattern = new RegExp(`^${prefix}\\[([^\\]]+)\\]$`);
  for (const [key, raw] of Object.entries(query)) {
    const match = pattern.exec(key);
    const value = ZQueryText.safeParse(raw);
    if (!match || !value.success) continue;
    const existing = result.get(match[1]);
    result.set(match[1], existing ? `${existing},${value.data}` : value.data);
  }
  return result;
}

/**
 * Reads get_related parameters. `limit` counts only when it is all digits and
 * `distinct` only when it says true; anything else is ignored.
 */
export function parseRelatedParams(query: z.infer<typeof ZRelatedQuery>): RelatedParams {
  const filters = bracketed(query.filter, query, "filter");
  const fields = new Map<string, string[]>();
  for (const [entity, list] of bracketed(query.fields, query, "fields")) {
    const names = splitList(list);
    if (names.length > 0) fields.set(entity, names);
  }

  const limit = query.limit?.trim();
  return {
    join: splitList(query.join),
    filters: Object.fromEntries(filters),
    fields,
    ordering: splitList(query.ordering),
    distinct: query.distinct?.trim().toLowerCase() === "true",
    limit: limit && /^[0-9]+$/.test(limit) ? parseInt(limit, 10) : undefined,
  };
}
