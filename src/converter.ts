/**
 * Converts CSV/TSV exports into a loadable data source.
 *
 * A JSON config maps the columns of each input file to property ids; the
 * columns mapped to `id` and `name` become the entity key and label. The
 * result is written either as the flat intermediate format or, when the
 * output name contains "sqlite", as a database with the relational schema.
 */

import Database from "better-sqlite3";
import { parse } from "csv-parse/sync";
import * as fs from "fs";
import * as path from "path";
import * as zlib from "zlib";
import { z } from "zod";
import { ConfigError, LoadError, getErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { METADATA_KEYS, REBUILD_FTS, SCHEMA_DDL, TABLES } from "./schema.js";
import { PROPERTY_PSEUDO_TYPE } from "./type-catalog.js";

const logger = createLogger("Converter");

export const ConverterConfigSchema = z.object({
  name: z.string().default(""),
  identifier_namespace: z.string().default(""),
  schema_namespace: z.string().default(""),
  property_names: z.record(z.string(), z.string()).default({}),
  view_url: z.string().default(""),
  files: z
    .array(
      z.object({
        id: z.string().min(1).refine((id) => !id.includes(":") && !id.includes(","), "type id must not contain ':' or ','"),
        name: z.string().default(""),
        description: z.string().default(""),
        filename: z.string().min(1),
        column2property: z.record(z.string().regex(/^\d+$/, "column keys must be 0-based indexes"), z.string()),
      }),
    )
    .min(1),
});

export type ConverterConfig = z.output<typeof ConverterConfigSchema>;
export type FileConfig = ConverterConfig["files"][number];

export interface ColumnMapping {
  file: string;
  column: number;
  header: string;
  property: string;
}

export interface ConvertedType {
  id: string;
  name: string;
  description: string;
  url: string;
}

export interface ConvertedProperty {
  id: string;
  name: string;
  typeIds: string[];
}

export interface ConvertedRow {
  id: string;
  name: string;
  typeId: string;
  attributes: Record<string, string>;
}

export interface ConversionPlan {
  config: ConverterConfig;
  mappings: ColumnMapping[];
  types: ConvertedType[];
  properties: ConvertedProperty[];
  rows: ConvertedRow[];
}

export interface ConvertOptions {
  /** Output filename, "-" for stdout. */
  output: string;
  dryRun?: boolean;
  /** Directory input filenames are resolved against; defaults to the working directory. */
  baseDir?: string;
}

const RecordsSchema = z.array(z.array(z.string()));

const SEPARATORS = /[_. -]+/g;

/** Display name for a property id: separators collapse to spaces, words are capitalised. */
export function titleCase(id: string): string {
  return id
    .replace(SEPARATORS, " ")
    .trim()
    .split(" ")
    .map((w) => (w === "" ? w : w.charAt(0).toUpperCase() + w.slice(1)))
    .join(" ");
}

// empty and "-" cells carry no value
function hasValue(cell: string | undefined): cell is string {
  return cell !== undefined && cell !== "" && cell !== "-";
}

export async function loadConverterConfig(filename: string): Promise<ConverterConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(filename, "utf8"));
  } catch (error) {
    throw new ConfigError(`Could not read converter config ${filename}: ${getErrorMessage(error)}`);
  }
  const parsed = ConverterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid converter config ${filename}: ${issues}`);
  }
  return parsed.data;
}

/** Records of a delimited file; `.csv` (after an optional `.gz`) is comma separated, anything else tab separated. */
async function readRecords(filename: string, maxLines?: number): Promise<string[][]> {
  let buffer = await fs.promises.readFile(filename);
  let name = filename.toLowerCase();
  if (name.endsWith(".gz")) {
    buffer = zlib.gunzipSync(buffer);
    name = name.slice(0, -3);
  }
  const delimiter = name.endsWith("csv") ? "," : "\t";
  const records: unknown = parse(buffer, {
    delimiter,
    relax_quotes: true,
    relax_column_count: true,
    skip_empty_lines: true,
    to_line: maxLines,
  });
  return RecordsSchema.parse(records);
}

function columnsOf(file: FileConfig): Array<[number, string]> {
  return Object.entries(file.column2property)
    .map(([col, prop]): [number, string] => [Number(col), prop])
    .filter(([, prop]) => prop !== "")
    .sort((x, y) => x[0] - y[0]);
}

/** Reads every input file into entity rows plus the type and property catalogs. */
export async function buildPlan(config: ConverterConfig, options: { baseDir?: string; headersOnly?: boolean } = {}): Promise<ConversionPlan> {
  const baseDir = options.baseDir ?? process.cwd();
  const plan: ConversionPlan = { config, mappings: [], types: [], properties: [], rows: [] };
  const propertyTypes = new Map<string, Set<string>>();

  for (const file of config.files) {
    if (!plan.types.some((t) => t.id === file.id)) {
      plan.types.push({ id: file.id, name: file.name || file.id, description: file.description, url: config.view_url });
    }

    const filename = path.resolve(baseDir, file.filename);
    logger.info(`Reading data from '${file.filename}'`);
    let records: string[][];
    try {
      records = await readRecords(filename, options.headersOnly ? 1 : undefined);
    } catch (error) {
      throw new LoadError(`${file.filename}: ${getErrorMessage(error)}`, error);
    }

    const [header = [], ...data] = records;
    for (let column = 0; column < header.length; column++) {
      plan.mappings.push({ file: file.filename, column, header: header[column] ?? "", property: file.column2property[String(column)] ?? "" });
    }
    if (options.headersOnly) continue;

    const columns = columnsOf(file);
    let skipped = 0;
    for (const record of data) {
      const row: ConvertedRow = { id: "", name: "", typeId: file.id, attributes: {} };
      for (const [column, property] of columns) {
        const cell = record[column];
        if (property === "id") row.id = cell ?? "";
        else if (property === "name") row.name = cell ?? "";
        else if (hasValue(cell)) row.attributes[property] = cell;
      }
      if (row.id === "") {
        skipped++;
        continue;
      }
      for (const property of Object.keys(row.attributes)) {
        if (property === "description") continue;
        const types = propertyTypes.get(property) ?? new Set<string>();
        types.add(file.id);
        propertyTypes.set(property, types);
      }
      plan.rows.push(row);
    }
    if (skipped > 0) logger.warn(`${file.filename}: skipped ${skipped} rows without an id`);
    logger.info(`${file.filename}: ${data.length - skipped} rows`);
  }

  for (const [id, types] of propertyTypes) {
    plan.properties.push({ id, name: config.property_names[id] ?? titleCase(id), typeIds: Array.from(types) });
  }
  return plan;
}

/** The plan in the flat intermediate format, one string per line. */
export function toFlatLines(plan: ConversionPlan): string[] {
  const { config } = plan;
  const lines = [
    [config.identifier_namespace, config.name, config.schema_namespace, JSON.stringify(plan.types)].join("\t"),
  ];
  for (const p of plan.properties) {
    lines.push([p.id, p.name, [PROPERTY_PSEUDO_TYPE, ...p.typeIds].join(","), "{}"].join("\t"));
  }
  for (const row of plan.rows) {
    lines.push([row.id, row.name, row.typeId, JSON.stringify(row.attributes)].join("\t"));
  }
  return lines;
}

/** Writes the plan into a fresh database; the whole load is one transaction. */
export function writeSqlite(plan: ConversionPlan, db: Database.Database): void {
  for (const ddl of SCHEMA_DDL) db.exec(ddl);

  const insertMeta = db.prepare(`INSERT OR REPLACE INTO ${TABLES.metadata} (meta_key, meta_value) VALUES (?, ?)`);
  const insertType = db.prepare(
    `INSERT OR REPLACE INTO ${TABLES.types} (type_id, type_name, type_description, type_url) VALUES (?, ?, ?, ?)`,
  );
  const insertProp = db.prepare(`INSERT OR REPLACE INTO ${TABLES.properties} (prop_id, prop_name) VALUES (?, ?)`);
  const insertPropType = db.prepare(`INSERT OR IGNORE INTO ${TABLES.propsToTypes} (prop_id, type_id) VALUES (?, ?)`);
  const insertEntity = db.prepare(
    `INSERT OR REPLACE INTO ${TABLES.entities} (ent_id, ent_name, ent_types, ent_description) VALUES (?, ?, ?, ?)`,
  );
  const insertValue = db.prepare(
    `INSERT OR IGNORE INTO ${TABLES.entityProperties} (ent_types, ent_id, prop_id, prop_value) VALUES (?, ?, ?, ?)`,
  );

  const load = db.transaction(() => {
    const { config } = plan;
    insertMeta.run(METADATA_KEYS.name, config.name);
    insertMeta.run(METADATA_KEYS.identifierNamespace, config.identifier_namespace);
    insertMeta.run(METADATA_KEYS.schemaNamespace, config.schema_namespace);
    insertMeta.run(METADATA_KEYS.viewUrl, config.view_url);

    for (const t of plan.types) insertType.run(t.id, t.name, t.description, t.url);
    for (const p of plan.properties) {
      insertProp.run(p.id, p.name);
      for (const typeId of p.typeIds) insertPropType.run(p.id, typeId);
    }
    for (const row of plan.rows) {
      const { description = "", ...values } = row.attributes;
      insertEntity.run(row.id, row.name, row.typeId, description);
      for (const [propId, value] of Object.entries(values)) insertValue.run(row.typeId, row.id, propId, value);
    }
    // replaced rows leave stale index entries behind
    db.exec(REBUILD_FTS);
  });
  load();
}

export interface ConversionSummary {
  mappings: ColumnMapping[];
  entities: number;
  properties: number;
  output?: string;
}

export async function convert(config: ConverterConfig, options: ConvertOptions): Promise<ConversionSummary> {
  if (options.dryRun) {
    const plan = await buildPlan(config, { baseDir: options.baseDir, headersOnly: true });
    for (const m of plan.mappings) {
      logger.info(`${m.file} column ${m.column} '${m.header}' => '${m.property}'`);
    }
    return { mappings: plan.mappings, entities: 0, properties: 0 };
  }

  const plan = await buildPlan(config, { baseDir: options.baseDir });
  const summary: ConversionSummary = {
    mappings: plan.mappings,
    entities: plan.rows.length,
    properties: plan.properties.length,
    output: options.output,
  };

  if (options.output.toLowerCase().includes("sqlite")) {
    if (fs.existsSync(options.output)) {
      throw new LoadError(`Output database ${options.output} already exists`);
    }
    const db = new Database(options.output);
    try {
      writeSqlite(plan, db);
    } finally {
      db.close();
    }
  } else {
    const text = toFlatLines(plan).join("\n") + "\n";
    if (options.output === "-") {
      process.stdout.write(text);
    } else {
      const data = options.output.endsWith(".gz") ? zlib.gzipSync(text) : text;
      await fs.promises.writeFile(options.output, data);
    }
  }
  logger.info(`Wrote ${summary.entities} entities and ${summary.properties} properties to '${options.output}'`);
  return summary;
}
