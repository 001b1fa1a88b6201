/**
 * Entity store backed by a pre-populated SQLite database with an FTS5 index.
 *
 * Types and properties are read once at open time and cached; entities and
 * their property values stay in the database and are fetched per request.
 * The database is opened read-only.
 */

import Database from "better-sqlite3";
import { primaryTypeOf, rawKeyOf } from "./entity-id.js";
import { EntityStore, effectiveLimit } from "./entity-store.js";
import { BackendError, getErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { buildEntitySearch } from "./query-builder.js";
import { METADATA_KEYS, TABLES } from "./schema.js";
import { EXACT_ID_SCORE, FirstHitScale, isMatch } from "./scoring.js";
import { TypeCatalog } from "./type-catalog.js";
import { Candidate, Entity, Property, PropertyValue, QueryRequest, QueryResponse, SourceMetadata, Type } from "./types.js";

const logger = createLogger("SqliteStore");

interface EntityRow {
  ent_id: string;
  ent_name: string;
  ent_description: string;
  ent_types: string;
}

interface SearchRow {
  ent_id: string;
  ent_name: string;
  ent_types: string;
  score: number;
}

interface PropertyValueRow {
  prop_id: string;
  prop_value: string;
}

function read<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new BackendError(`${what} failed: ${getErrorMessage(error)}`, error);
  }
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => "\\" + c);
}

function loadMetadata(db: Database.Database): SourceMetadata {
  const rows = db
    .prepare<[], { meta_key: string; meta_value: string | null }>(`SELECT meta_key, meta_value FROM ${TABLES.metadata}`)
    .all();
  const meta: SourceMetadata = { name: "", identifierNamespace: "", schemaNamespace: "", viewUrl: "" };
  for (const { meta_key, meta_value } of rows) {
    const value = meta_value ?? "";
    switch (meta_key) {
      case METADATA_KEYS.name:
        meta.name = value;
        break;
      case METADATA_KEYS.identifierNamespace:
        meta.identifierNamespace = value;
        break;
      case METADATA_KEYS.schemaNamespace:
        meta.schemaNamespace = value;
        break;
      case METADATA_KEYS.viewUrl:
        meta.viewUrl = value;
        break;
    }
  }
  return meta;
}

function loadCatalog(db: Database.Database): TypeCatalog {
  const types: Type[] = db
    .prepare<[], { type_id: string; type_name: string; type_description: string; type_url: string }>(
      `SELECT type_id, type_name, COALESCE(type_description, '') AS type_description, COALESCE(type_url, '') AS type_url
       FROM ${TABLES.types} ORDER BY rowid`,
    )
    .all()
    .map((r) => ({
      id: r.type_id,
      name: r.type_name,
      description: r.type_description || undefined,
      viewUrl: r.type_url || undefined,
    }));

  // property id -> type ids it applies to
  const pairs = new Map<string, string[]>();
  const pairRows = db
    .prepare<[], { prop_id: string; type_id: string }>(`SELECT prop_id, type_id FROM ${TABLES.propsToTypes} ORDER BY rowid`)
    .all();
  for (const { prop_id, type_id } of pairRows) {
    const list = pairs.get(prop_id) ?? [];
    list.push(type_id);
    pairs.set(prop_id, list);
  }

  const properties: Array<{ property: Property; typeIds: string[] }> = [];
  const propRows = db
    .prepare<[], { prop_id: string; prop_name: string; prop_description: string }>(
      `SELECT prop_id, prop_name, COALESCE(prop_description, '') AS prop_description FROM ${TABLES.properties} ORDER BY rowid`,
    )
    .all();
  for (const r of propRows) {
    const typeIds = pairs.get(r.prop_id);
    if (!typeIds) {
      logger.debug(`Property '${r.prop_id}' is not attached to any type`);
      continue;
    }
    properties.push({
      property: { id: r.prop_id, name: r.prop_name, description: r.prop_description || undefined },
      typeIds,
    });
  }

  return new TypeCatalog(types, properties);
}

export class SqliteStore implements EntityStore {
  private readonly db: Database.Database;
  private readonly metadata: SourceMetadata;
  private readonly catalog: TypeCatalog;

  private readonly byIdStmt: Database.Statement<[string], EntityRow>;
  private readonly byPrefixStmt: Database.Statement<[string, string, number], EntityRow>;
  private readonly propertyValuesStmt: Database.Statement<[string, string], PropertyValueRow>;

  private constructor(db: Database.Database) {
    this.db = db;
    this.metadata = Object.freeze(read("Loading metadata", () => loadMetadata(db)));
    this.catalog = read("Loading type catalog", () => loadCatalog(db));

    this.byIdStmt = read("Preparing statements", () =>
      db.prepare<[string], EntityRow>(
        `SELECT ent_id, ent_name, COALESCE(ent_description, '') AS ent_description, ent_types
         FROM ${TABLES.entities} WHERE ent_id = ? ORDER BY ent_types`,
      ),
    );
    this.byPrefixStmt = read("Preparing statements", () =>
      db.prepare<[string, string, number], EntityRow>(
        `SELECT ent_id, ent_name, COALESCE(ent_description, '') AS ent_description, ent_types
         FROM ${TABLES.entities}
         WHERE (ent_id LIKE ? ESCAPE '\\' OR ent_name LIKE ? ESCAPE '\\')
         ORDER BY ent_name, ent_id LIMIT ?`,
      ),
    );
    this.propertyValuesStmt = read("Preparing statements", () =>
      db.prepare<[string, string], PropertyValueRow>(
        `SELECT prop_id, prop_value FROM ${TABLES.entityProperties}
         WHERE ent_types = ? AND ent_id = ? ORDER BY prop_id, prop_value`,
      ),
    );
  }

  /** Opens an existing database file read-only. */
  static async open(filename: string): Promise<SqliteStore> {
    const db = read(`Opening ${filename}`, () => new Database(filename, { readonly: true, fileMustExist: true }));
    try {
      const store = new SqliteStore(db);
      logger.info(`Opened '${filename}' (${store.types().length} types)`);
      return store;
    } catch (error) {
      db.close();
      throw error;
    }
  }

  /** Wraps an already open connection; the store takes ownership of it. */
  static fromDatabase(db: Database.Database): SqliteStore {
    return new SqliteStore(db);
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

  private rowToEntity(row: EntityRow): Entity {
    const typeIds = this.catalog.resolveTypeIds(row.ent_types);
    return {
      id: this.catalog.entityId(row.ent_id, typeIds),
      name: row.ent_name,
      description: row.ent_description || undefined,
      types: this.catalog.resolveTypes(typeIds),
      properties: {},
    };
  }

  private exactIdRows(rawKey: string): EntityRow[] {
    return read("Exact id lookup", () => this.byIdStmt.all(rawKey));
  }

  async getEntity(id: string): Promise<Entity | null> {
    const typeId = primaryTypeOf(id);
    for (const row of this.exactIdRows(rawKeyOf(id))) {
      const entity = this.rowToEntity(row);
      const holdsType = typeId === "" ? entity.types.length === 0 : entity.types.some((t) => t.id === typeId);
      if (!holdsType) continue;

      const values = read("Property value lookup", () => this.propertyValuesStmt.all(row.ent_types, row.ent_id));
      const props: Record<string, PropertyValue[]> = {};
      for (const { prop_id, prop_value } of values) {
        (props[prop_id] ??= []).push(prop_value);
      }
      entity.properties = props;
      return entity;
    }
    return null;
  }

  async query(request: QueryRequest): Promise<QueryResponse> {
    const limit = effectiveLimit(request.limit);
    const res: QueryResponse = { id: request.id ?? "", result: [] };
    logger.debug("query", { id: res.id, query: request.query, type: request.type, limit });

    // fast-track exact raw key matches
    const exact = this.exactIdRows(request.query);
    if (exact.length > 0) {
      res.result = exact.slice(0, limit).map((row) => {
        const e = this.rowToEntity(row);
        return { id: e.id, name: e.name, types: e.types, score: EXACT_ID_SCORE, match: true };
      });
      return res;
    }

    const search = buildEntitySearch(request.query, request.properties ?? []);
    if (search === null) return res;

    res.result = read("Full-text search", () => {
      const stmt = this.db.prepare<string[], SearchRow>(search.sql);
      const accepted: Candidate[] = [];
      const scale = new FirstHitScale(request.query);

      for (const row of stmt.iterate(...search.params)) {
        const typeIds = this.catalog.resolveTypeIds(row.ent_types);
        if (request.type && !typeIds.includes(request.type)) continue;

        const id = this.catalog.entityId(row.ent_id, typeIds);
        const score = scale.score(id, row.ent_name, row.score);
        accepted.push({ id, name: row.ent_name, types: this.catalog.resolveTypes(typeIds), score, match: isMatch(score) });
        if (accepted.length === limit) break;
      }
      return accepted;
    });
    return res;
  }

  async queryPrefix(text: string, limit: number): Promise<Entity[]> {
    const max = effectiveLimit(limit);

    const exact = this.exactIdRows(text);
    if (exact.length > 0) {
      return exact.slice(0, max).map((row) => this.rowToEntity(row));
    }

    const pattern = escapeLike(text) + "%";
    const rows = read("Prefix search", () => this.byPrefixStmt.all(pattern, pattern, max));
    return rows.map((row) => this.rowToEntity(row));
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
