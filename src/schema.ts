// Relational layout shared by the SQLite store, the converter and the tests.

export const TABLES = {
  metadata: "recon_metadata",
  types: "recon_types",
  properties: "recon_properties",
  propsToTypes: "recon_props2types",
  entities: "recon_entities",
  entityProperties: "recon_entity_properties",
  entitiesFts: "recon_entities_fts",
} as const;

export const METADATA_KEYS = {
  name: "name",
  identifierNamespace: "identifierNamespace",
  schemaNamespace: "schemaNamespace",
  viewUrl: "view_url",
} as const;

export const SCHEMA_DDL: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS ${TABLES.metadata} (
    meta_key TEXT PRIMARY KEY,
    meta_value TEXT
  )`,

  `CREATE TABLE IF NOT EXISTS ${TABLES.types} (
    type_id TEXT PRIMARY KEY,
    type_name TEXT NOT NULL,
    type_description TEXT,
    type_url TEXT
  )`,

  `CREATE TABLE IF NOT EXISTS ${TABLES.properties} (
    prop_id TEXT PRIMARY KEY,
    prop_name TEXT NOT NULL,
    prop_description TEXT
  )`,

  `CREATE TABLE IF NOT EXISTS ${TABLES.propsToTypes} (
    prop_id TEXT REFERENCES ${TABLES.properties} (prop_id),
    type_id TEXT REFERENCES ${TABLES.types} (type_id),
    PRIMARY KEY (prop_id, type_id)
  )`,

  // ent_types is the comma-separated type id list, primary type first
  `CREATE TABLE IF NOT EXISTS ${TABLES.entities} (
    ent_types TEXT NOT NULL,
    ent_id TEXT NOT NULL,
    ent_name TEXT NOT NULL,
    ent_description TEXT,
    PRIMARY KEY (ent_id, ent_types)
  )`,

  `CREATE TABLE IF NOT EXISTS ${TABLES.entityProperties} (
    ent_types TEXT NOT NULL,
    ent_id TEXT NOT NULL,
    prop_id TEXT NOT NULL,
    prop_value TEXT NOT NULL,
    PRIMARY KEY (ent_types, ent_id, prop_id, prop_value)
  )`,

  `CREATE VIRTUAL TABLE IF NOT EXISTS ${TABLES.entitiesFts} USING fts5(
    ent_id, ent_name, ent_description, ent_types,
    content='${TABLES.entities}'
  )`,

  // keep the external-content index in sync with the entities table
  `CREATE TRIGGER IF NOT EXISTS recon_entities_ai AFTER INSERT ON ${TABLES.entities} BEGIN
    INSERT INTO ${TABLES.entitiesFts}(rowid, ent_id, ent_name, ent_description, ent_types)
    VALUES (NEW.rowid, NEW.ent_id, NEW.ent_name, NEW.ent_description, NEW.ent_types);
  END`,

  `CREATE TRIGGER IF NOT EXISTS recon_entities_ad AFTER DELETE ON ${TABLES.entities} BEGIN
    INSERT INTO ${TABLES.entitiesFts}(${TABLES.entitiesFts}, rowid, ent_id, ent_name, ent_description, ent_types)
    VALUES ('delete', OLD.rowid, OLD.ent_id, OLD.ent_name, OLD.ent_description, OLD.ent_types);
  END`,
];

export const REBUILD_FTS = `INSERT INTO ${TABLES.entitiesFts}(${TABLES.entitiesFts}) VALUES ('rebuild')`;
