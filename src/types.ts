// Core types for the entity reconciliation store

export interface Type {
  id: string;
  name: string;
  description?: string;
  viewUrl?: string;       // template with a {{id}} / ${id} placeholder
}

export interface Property {
  id: string;
  name: string;
  description?: string;
  valueType?: string;
}

export interface EntityReference {
  id: string;
  name?: string;
}

export type PropertyValue = string | number | boolean | EntityReference;

export interface Entity {
  id: string;             // composite "primaryType:rawKey"
  name: string;
  description?: string;
  types: Type[];
  properties: Record<string, PropertyValue[]>;
}

export interface Candidate {
  id: string;
  name: string;
  types: Type[];
  score: number;
  match: boolean;
}

export interface QueryProperty {
  pid: string;
  v: PropertyValue;
}

export interface QueryRequest {
  id?: string;
  query: string;
  type?: string;
  limit?: number;
  properties?: QueryProperty[];
  type_strict?: "any" | "all" | "should";   // accepted, not used for scoring
}

export interface QueryResponse {
  id: string;
  result: Candidate[];
}

export interface SourceMetadata {
  name: string;
  identifierNamespace: string;
  schemaNamespace: string;
  viewUrl: string;
}

export function isEntityReference(value: unknown): value is EntityReference {
  return typeof value === "object" && value !== null && "id" in value && typeof value.id === "string";
}
