// Entity store held entirely in memory. Queries are linear scans.

import { primaryTypeOf, rawKeyOf } from "./entity-id.js";
import { EntityStore, constraintValue, effectiveLimit, propertyValueString } from "./entity-store.js";
import { createLogger } from "./logger.js";
import { EXACT_ID_SCORE, TYPE_BONUS, heuristicScore, isMatch } from "./scoring.js";
import { TypeCatalog, isPropertyRow, splitTypeList, PROPERTY_PSEUDO_TYPE } from "./type-catalog.js";
import {
  Candidate,
  Entity,
  Property,
  PropertyValue,
  QueryRequest,
  QueryResponse,
  SourceMetadata,
  Type,
  isEntityReference,
} from "./types.js";

const logger = createLogger("MemoryStore");

/**
 * One loader record. Rows are resolved by the store: a type list containing
 * the `property` pseudo-type defines a Property, anything else an Entity.
 */
export type CatalogRecord =
  | { kind: "type"; type: Type }
  | { kind: "row"; id: string; name: string; typeList: string; attributes: Record<string, unknown> };

export interface MemoryStoreOptions {
  metadata: SourceMetadata;
  defaultTypeId?: string;
}

function toPropertyValues(value: unknown): PropertyValue[] {
  if (Array.isArray(value)) return value.flatMap((v) => toPropertyValues(v));
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return [value];
  if (isEntityReference(value)) {
    return [typeof value.name === "string" ? { id: value.id, name: value.name } : { id: value.id }];
  }
  if (value === null || value === undefined) return [];
  return [JSON.stringify(value)];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function freezeEntity(entity: Entity): Entity {
  Object.freeze(entity.types);
  for (const values of Object.values(entity.properties)) Object.freeze(values);
  Object.freeze(entity.properties);
  return Object.freeze(entity);
}

export class MemoryStore implements EntityStore {
  private readonly metadata: SourceMetadata;
  private readonly catalog: TypeCatalog;

  // composite id -> entity
  private readonly entities: ReadonlyMap<string, Entity>;

  // raw key -> every entity loaded under that key, one per primary type
  private readonly entitiesByRawKey: ReadonlyMap<string, readonly Entity[]>;

  private constructor(metadata: SourceMetadata, catalog: TypeCatalog, entities: Map<string, Entity>) {
    const byRawKey = new Map<string, Entity[]>();
    for (const e of entities.values()) {
      const key = rawKeyOf(e.id);
      const list = byRawKey.get(key) ?? [];
      list.push(e);
      byRawKey.set(key, list);
    }

    this.metadata = Object.freeze({ ...metadata });
    this.catalog = catalog;
    this.entities = entities;
    this.entitiesByRawKey = byRawKey;
  }

  static fromRecords(records: Iterable<CatalogRecord>, options: MemoryStoreOptions): MemoryStore {
    const types: Type[] = [];
    const rows: Array<Extract<CatalogRecord, { kind: "row" }>> = [];
    for (const record of records) {
      if (record.kind === "type") types.push(record.type);
      else rows.push(record);
    }

    const defaultTypeId = options.defaultTypeId ?? types[0]?.id ?? "";
    const properties: Array<{ property: Property; typeIds: string[] }> = [];
    const entityRows: typeof rows = [];

    for (const row of rows) {
      const typeIds = splitTypeList(row.typeList);
      if (!isPropertyRow(typeIds)) {
        entityRows.push(row);
        continue;
      }
      const appliesTo = typeIds.filter((t) => t !== PROPERTY_PSEUDO_TYPE);
      if (appliesTo.length === 0 && defaultTypeId !== "") appliesTo.push(defaultTypeId);
      properties.push({
        property: {
          id: row.id,
          name: row.name,
          description: optionalString(row.attributes.description),
          valueType: optionalString(row.attributes.value_type),
        },
        typeIds: appliesTo,
      });
    }

    const catalog = new TypeCatalog(types, properties, defaultTypeId);
    const entities = new Map<string, Entity>();

    for (const row of entityRows) {
      const typeIds = catalog.resolveTypeIds(row.typeList);
      const { description, ...rest } = row.attributes;
      const props: Record<string, PropertyValue[]> = {};
      for (const [pid, value] of Object.entries(rest)) {
        const values = toPropertyValues(value);
        if (values.length > 0) props[pid] = values;
      }

      const entity: Entity = {
        id: catalog.entityId(row.id, typeIds),
        name: row.name,
        description: optionalString(description),
        types: catalog.resolveTypes(typeIds),
        properties: props,
      };
      if (entities.has(entity.id)) {
        logger.debug(`Duplicate entity '${entity.id}', keeping the last row`);
      }
      entities.set(entity.id, freezeEntity(entity));
    }

    logger.info(`Loaded ${entities.size} entities, ${types.length} types, ${properties.length} properties`);
    return new MemoryStore(options.metadata, catalog, entities);
  }

  name(): string {
    return this.metadata.name;
  }

  identifierNamespace(): string {
    return this.metadata.identifierNamespace;
  }

  schemaNamespace(): string {
    return this.metadata.schemaNamespace;
  }

  viewURLTemplate(): string {
    return this.metadata.viewUrl;
  }

  types(): Type[] {
    return this.catalog.allTypes();
  }

  propertiesFor(typeId: string): Property[] {
    return this.catalog.propertiesFor(typeId);
  }

  size(): number {
    return this.entities.size;
  }

  async getEntity(id: string): Promise<Entity | null> {
    const typeId = primaryTypeOf(id);
    const variants = this.entitiesByRawKey.get(rawKeyOf(id)) ?? [];
    for (const e of variants) {
      const holdsType = typeId === "" ? e.types.length === 0 : e.types.some((t) => t.id === typeId);
      if (holdsType) return e;
    }
    return null;
  }

  async query(request: QueryRequest): Promise<QueryResponse> {
    const limit = effectiveLimit(request.limit);
    const res: QueryResponse = { id: request.id ?? "", result: [] };
    logger.debug("query", { id: res.id, query: request.query, type: request.type, limit });

    // fast-track exact raw key matches
    const exact = this.entitiesByRawKey.get(request.query);
    if (exact && exact.length > 0) {
      res.result = exact.slice(0, limit).map((e) => ({
        id: e.id,
        name: e.name,
        types: e.types,
        score: EXACT_ID_SCORE,
        match: true,
      }));
      return res;
    }

    const constraints = (request.properties ?? []).map((c) => ({ pid: c.pid, value: constraintValue(c) }));

    const candidates: Candidate[] = [];
    for (const e of this.entities.values()) {
      let score = heuristicScore(request.query, rawKeyOf(e.id), e.name);
      if (request.type && e.types.some((t) => t.id === request.type)) {
        score += TYPE_BONUS;
      }
      if (score <= 0) continue;

      const satisfied = constraints.every(({ pid, value }) =>
        (e.properties[pid] ?? []).some((v) => propertyValueString(v) === value),
      );
      if (!satisfied) continue;

      candidates.push({ id: e.id, name: e.name, types: e.types, score, match: isMatch(score) });
    }

    candidates.sort((a, b) => b.score - a.score || compareStrings(a.id, b.id));
    res.result = candidates.slice(0, limit);
    return res;
  }

  async queryPrefix(text: string, limit: number): Promise<Entity[]> {
    const max = effectiveLimit(limit);

    const exact = this.entitiesByRawKey.get(text);
    if (exact && exact.length > 0) {
      return exact.slice(0, max);
    }

    const low = text.toLowerCase();
    const result: Entity[] = [];
    for (const e of this.entities.values()) {
      if (e.name.toLowerCase().startsWith(low) || rawKeyOf(e.id).toLowerCase().startsWith(low)) {
        result.push(e);
      }
    }

    result.sort((a, b) => compareStrings(a.name, b.name) || compareStrings(rawKeyOf(a.id), rawKeyOf(b.id)));
    return result.slice(0, max);
  }

  async close(): Promise<void> {
    // nothing held outside the process heap
  }
}
