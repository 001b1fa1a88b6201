/**
 * Full-text search SQL for the SQLite store.
 *
 * Values only ever travel as bound parameters; the SQL text holds nothing but
 * table names and generated aliases. Parameters are pushed in the same order
 * their placeholders are emitted: the MATCH expression, then one
 * (property id, value) pair per property filter.
 */

import { constraintValue } from "./entity-store.js";
import { TABLES } from "./schema.js";
import { QueryProperty } from "./types.js";

export interface BuiltQuery {
  sql: string;
  params: string[];
}

/** Sequential table aliases: 0 -> a, 1 -> b, ... 25 -> z, 26 -> aa. */
export function tableAlias(index: number): string {
  let n = index + 1;
  let alias = "";
  while (n > 0) {
    n -= 1;
    alias = String.fromCharCode(97 + (n % 26)) + alias;
    n = Math.floor(n / 26);
  }
  return alias;
}

/**
 * Turns free text into an FTS5 expression: every token becomes a quoted
 * string, and the last one a prefix query. Returns null when the text holds
 * no token at all.
 */
export function ftsMatchExpression(text: string): string | null {
  const tokens = text.split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) return null;
  const quoted = tokens.map((t) => `"${t.replace(/"/g, '""')}"`);
  quoted[quoted.length - 1] += "*";
  return quoted.join(" ");
}

export class FtsSearchQuery {
  private readonly from: string[] = [`${TABLES.entitiesFts} a`];
  private readonly where: string[] = [`${TABLES.entitiesFts} MATCH ?`];
  private readonly params: string[];
  private filterCount = 0;

  constructor(matchExpression: string) {
    this.params = [matchExpression];
  }

  /** Requires the candidate to hold `value` for `propertyId`. */
  whereProperty(propertyId: string, value: string): this {
    this.filterCount += 1;
    const t = tableAlias(this.filterCount);
    this.from.push(`${TABLES.entityProperties} ${t}`);
    this.where.push(
      `a.ent_id = ${t}.ent_id AND a.ent_types = ${t}.ent_types AND ${t}.prop_id = ? AND ${t}.prop_value = ?`,
    );
    this.params.push(propertyId, value);
    return this;
  }

  build(): BuiltQuery {
    const sql =
      `SELECT a.ent_id, a.ent_name, a.ent_types, bm25(${TABLES.entitiesFts}) AS score ` +
      `FROM ${this.from.join(", ")} ` +
      `WHERE ${this.where.join(" AND ")} ` +
      `ORDER BY score, a.ent_id`;
    return { sql, params: [...this.params] };
  }
}

/**
 * Search statement for a query text and its property constraints, or null
 * when the text cannot produce a full-text match. Throws MalformedQueryError
 * for a constraint value that cannot be compared.
 */
export function buildEntitySearch(text: string, constraints: QueryProperty[] = []): BuiltQuery | null {
  const filters = constraints.map((c) => [c.pid, constraintValue(c)] as const);
  const expression = ftsMatchExpression(text);
  if (expression === null) return null;

  const query = new FtsSearchQuery(expression);
  for (const [propertyId, value] of filters) {
    query.whereProperty(propertyId, value);
  }
  return query.build();
}
