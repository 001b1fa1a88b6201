/**
 * Loads the flat intermediate format into a MemoryStore.
 *
 * Tab-separated, four columns, optionally gzip-compressed (`.gz`):
 *
 *   header     identifier namespace | source name | schema namespace | JSON list of types
 *   property   property id | name | "property,<type ids>" | JSON settings {description, value_type}
 *   entity     entity id | name | comma-separated type ids | JSON object {description, ...property values}
 */

import * as fs from "fs";
import * as zlib from "zlib";
import { z } from "zod";
import { LoadError, getErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { CatalogRecord, MemoryStore } from "./memory-store.js";
import { SourceMetadata, Type } from "./types.js";

const logger = createLogger("FlatFileLoader");

/** Type assumed for rows without types when the header declares none. */
export const FALLBACK_TYPE: Type = { id: "item", name: "Item" };

const HeaderTypesSchema = z.array(
  z.object({
    id: z.string().min(1),
    name: z.string().optional(),
    description: z.string().optional(),
    url: z.string().optional(),
  }),
);

const AttributesSchema = z.record(z.string(), z.unknown());

export interface FlatFileContents {
  metadata: SourceMetadata;
  defaultTypeId: string;
  records: CatalogRecord[];
}

function splitColumns(line: string): string[] {
  const cols: string[] = [];
  let rest = line;
  while (cols.length < 3) {
    const at = rest.indexOf("\t");
    if (at < 0) break;
    cols.push(rest.slice(0, at));
    rest = rest.slice(at + 1);
  }
  cols.push(rest);
  return cols;
}

function parseJson(text: string, lineNo: number): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new LoadError(`Line ${lineNo}: invalid JSON (${getErrorMessage(error)})`, error);
  }
}

function parseHeader(cols: string[], lineNo: number): { metadata: SourceMetadata; types: Type[] } {
  const [identifierNamespace = "", name = "", schemaNamespace = "", typesJson = ""] = cols;
  const metadata: SourceMetadata = { name, identifierNamespace, schemaNamespace, viewUrl: "" };

  if (typesJson.trim() === "") {
    return { metadata, types: [FALLBACK_TYPE] };
  }

  const parsed = HeaderTypesSchema.safeParse(parseJson(typesJson, lineNo));
  if (!parsed.success) {
    throw new LoadError(`Line ${lineNo}: invalid type list: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }

  const types: Type[] = parsed.data.map((t) => ({
    id: t.id,
    name: t.name ?? t.id,
    description: t.description || undefined,
    viewUrl: t.url || undefined,
  }));
  metadata.viewUrl = parsed.data[0]?.url ?? "";
  return { metadata, types: types.length > 0 ? types : [FALLBACK_TYPE] };
}

/** Parses flat-format lines. The first non-empty line is the header. */
export function parseFlatLines(lines: Iterable<string>): FlatFileContents {
  let header: { metadata: SourceMetadata; types: Type[] } | undefined;
  const records: CatalogRecord[] = [];
  let lineNo = 0;

  for (const line of lines) {
    lineNo += 1;
    if (line.trim() === "") continue;
    const cols = splitColumns(line);

    if (!header) {
      header = parseHeader(cols, lineNo);
      for (const type of header.types) records.push({ kind: "type", type });
      continue;
    }

    const [id, name, typeList, attributesJson] = cols;
    if (id === undefined || name === undefined || typeList === undefined || !attributesJson) {
      throw new LoadError(`Line ${lineNo}: expected 4 tab-separated columns`);
    }

    let attributes: Record<string, unknown> = {};
    if (attributesJson !== "{}") {
      const parsed = AttributesSchema.safeParse(parseJson(attributesJson, lineNo));
      if (!parsed.success) {
        throw new LoadError(`Line ${lineNo}: 4th column must be a JSON object`);
      }
      attributes = parsed.data;
    }
    records.push({ kind: "row", id, name, typeList, attributes });
  }

  if (!header) {
    throw new LoadError("Flat file has no header line");
  }

  const first = header.types[0];
  return {
    metadata: header.metadata,
    defaultTypeId: first ? first.id : FALLBACK_TYPE.id,
    records,
  };
}

async function readLines(filename: string): Promise<string[]> {
  const raw = await fs.promises.readFile(filename);
  const text = filename.endsWith(".gz") ? zlib.gunzipSync(raw).toString("utf8") : raw.toString("utf8");
  return text.split(/\r?\n/);
}

export async function loadFlatFile(filename: string): Promise<MemoryStore> {
  let contents: FlatFileContents;
  try {
    contents = parseFlatLines(await readLines(filename));
  } catch (error) {
    if (error instanceof LoadError) {
      throw new LoadError(`${filename}: ${error.message}`, error);
    }
    throw new LoadError(`Could not read ${filename}: ${getErrorMessage(error)}`, error);
  }

  const store = MemoryStore.fromRecords(contents.records, {
    metadata: contents.metadata,
    defaultTypeId: contents.defaultTypeId,
  });
  logger.info(`Loaded ${store.size()} entities from '${filename}'`);
  return store;
}
