import { rawKeyOf } from "./entity-id.js";
import { MalformedQueryError } from "./errors.js";
import { Entity, Property, PropertyValue, QueryProperty, QueryRequest, QueryResponse, Type, isEntityReference } from "./types.js";

export const DEFAULT_QUERY_LIMIT = 25;

/**
 * A searchable, read-only collection of typed entities. Both backends answer
 * every operation with the same observable semantics; which one is in use is
 * decided once, when the store is opened.
 *
 * Implementations are immutable after construction: nothing here writes, so a
 * store can be shared by all request handlers without locking.
 */
export interface EntityStore {
  name(): string;
  identifierNamespace(): string;
  schemaNamespace(): string;
  viewURLTemplate(): string;

  types(): Type[];

  /** Properties declared for a type, in declaration order. Empty for unknown types. */
  propertiesFor(typeId: string): Property[];

  /** Exact composite-id lookup with property values filled in. */
  getEntity(id: string): Promise<Entity | null>;

  query(request: QueryRequest): Promise<QueryResponse>;

  queryPrefix(text: string, limit: number): Promise<Entity[]>;

  close(): Promise<void>;
}

export function effectiveLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) return DEFAULT_QUERY_LIMIT;
  return Math.floor(limit);
}

/**
 * The string a property constraint is compared against. Entity references
 * compare by raw key, so `{ id: "person:q42" }` and a stored "q42" match.
 */
export function constraintValue(constraint: QueryProperty): string {
  if (typeof constraint.pid !== "string" || constraint.pid === "") {
    throw new MalformedQueryError("Property constraint is missing its property id");
  }
  const value: unknown = constraint.v;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (isEntityReference(value)) {
    if (value.id === "") {
      throw new MalformedQueryError(`Entity reference for property '${constraint.pid}' has an empty id`);
    }
    return rawKeyOf(value.id);
  }
  throw new MalformedQueryError(`Unsupported value for property '${constraint.pid}': ${JSON.stringify(value) ?? String(value)}`);
}

export function propertyValueString(value: PropertyValue): string {
  if (isEntityReference(value)) return rawKeyOf(value.id);
  return String(value);
}
