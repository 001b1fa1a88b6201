import Database from "better-sqlite3";
import { EntityStore } from "../entity-store.js";
import { parseFlatLines } from "../flatfile-loader.js";
import { MemoryStore } from "../memory-store.js";
import { METADATA_KEYS, SCHEMA_DDL, TABLES } from "../schema.js";
import { SqliteStore } from "../sqlite-store.js";

export const VIEW_URL = "https://example.org/view/{{id}}";

const TYPES = [
  { id: "person", name: "Person", url: VIEW_URL },
  { id: "book", name: "Book" },
];

const PEOPLE = [
  { id: "q42", name: "Douglas Adams", description: "English writer", born: "1952", nationality: "british" },
  { id: "q5", name: "Douglas Hofstadter", description: "", born: "1945", nationality: "american" },
  { id: "q7", name: "Adam Smith", description: "", born: "1723", nationality: "british" },
];

export const FLAT_LINES = [
  ["test:ids", "Test People", "test:schema", JSON.stringify(TYPES)].join("\t"),
  ["born", "Born", "property,person", JSON.stringify({ description: "Year of birth" })].join("\t"),
  ["nationality", "Nationality", "property,person", "{}"].join("\t"),
  ["author", "Author", "property,book", "{}"].join("\t"),
  ...PEOPLE.map(({ id, name, description, born, nationality }) =>
    [id, name, "person", JSON.stringify(description ? { description, born, nationality } : { born, nationality })].join("\t"),
  ),
  ["b1", "The Hitchhiker's Guide", "book", JSON.stringify({ author: { id: "person:q42" } })].join("\t"),
];

export function createMemoryStore(): MemoryStore {
  const contents = parseFlatLines(FLAT_LINES);
  return MemoryStore.fromRecords(contents.records, { metadata: contents.metadata, defaultTypeId: contents.defaultTypeId });
}

/** The same dataset in an in-memory database with the real schema. */
export function createSqliteDatabase(): Database.Database {
  const db = new Database(":memory:");
  for (const ddl of SCHEMA_DDL) db.exec(ddl);

  const meta = db.prepare(`INSERT INTO ${TABLES.metadata} (meta_key, meta_value) VALUES (?, ?)`);
  meta.run(METADATA_KEYS.name, "Test People");
  meta.run(METADATA_KEYS.identifierNamespace, "test:ids");
  meta.run(METADATA_KEYS.schemaNamespace, "test:schema");
  meta.run(METADATA_KEYS.viewUrl, VIEW_URL);

  const type = db.prepare(`INSERT INTO ${TABLES.types} (type_id, type_name, type_description, type_url) VALUES (?, ?, ?, ?)`);
  type.run("person", "Person", null, VIEW_URL);
  type.run("book", "Book", null, null);

  const prop = db.prepare(`INSERT INTO ${TABLES.properties} (prop_id, prop_name, prop_description) VALUES (?, ?, ?)`);
  const propType = db.prepare(`INSERT INTO ${TABLES.propsToTypes} (prop_id, type_id) VALUES (?, ?)`);
  prop.run("born", "Born", "Year of birth");
  propType.run("born", "person");
  prop.run("nationality", "Nationality", null);
  propType.run("nationality", "person");
  prop.run("author", "Author", null);
  propType.run("author", "book");

  const entity = db.prepare(
    `INSERT INTO ${TABLES.entities} (ent_types, ent_id, ent_name, ent_description) VALUES (?, ?, ?, ?)`,
  );
  const value = db.prepare(
    `INSERT INTO ${TABLES.entityProperties} (ent_types, ent_id, prop_id, prop_value) VALUES (?, ?, ?, ?)`,
  );
  for (const p of PEOPLE) {
    entity.run("person", p.id, p.name, p.description);
    value.run("person", p.id, "born", p.born);
    value.run("person", p.id, "nationality", p.nationality);
  }
  entity.run("book", "b1", "The Hitchhiker's Guide", "");
  value.run("book", "b1", "author", "q42");
  return db;
}

export function createSqliteStore(): SqliteStore {
  return SqliteStore.fromDatabase(createSqliteDatabase());
}

/** Names sharing the word "Widget", more of them than the default limit. */
export const WIDGET_COUNT = 30;

function widgets(): Array<{ id: string; name: string }> {
  return Array.from({ length: WIDGET_COUNT }, (_, i) => ({ id: `w${i + 1}`, name: `Widget ${i + 1}` }));
}

export function createWidgetStores(): Array<[string, EntityStore]> {
  const lines = [
    ["test:widgets", "Widgets", "test:schema", JSON.stringify([{ id: "gadget", name: "Gadget" }])].join("\t"),
    ...widgets().map((w) => [w.id, w.name, "gadget", "{}"].join("\t")),
  ];
  const contents = parseFlatLines(lines);
  const memory = MemoryStore.fromRecords(contents.records, { metadata: contents.metadata, defaultTypeId: contents.defaultTypeId });

  const db = new Database(":memory:");
  for (const ddl of SCHEMA_DDL) db.exec(ddl);
  db.prepare(`INSERT INTO ${TABLES.types} (type_id, type_name, type_description, type_url) VALUES (?, ?, ?, ?)`).run(
    "gadget",
    "Gadget",
    null,
    null,
  );
  const entity = db.prepare(
    `INSERT INTO ${TABLES.entities} (ent_types, ent_id, ent_name, ent_description) VALUES (?, ?, ?, ?)`,
  );
  for (const w of widgets()) entity.run("gadget", w.id, w.name, "");

  return [
    ["memory", memory],
    ["sqlite", SqliteStore.fromDatabase(db)],
  ];
}
