import { z } from "zod";
import { EntityStore } from "./entity-store.js";
import { NotFoundError } from "./errors.js";
import { createLogger } from "./logger.js";
import { Manifest, ManifestType, buildManifest, toManifestType } from "./manifest.js";
import { Entity, Property, PropertyValue, QueryResponse, isEntityReference } from "./types.js";

const logger = createLogger("ReconService");

export const SUGGEST_LIMIT = 25;

// --- Request schemas ---

const PropertyValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.object({ id: z.string(), name: z.string().optional() }),
]);

export const QueryRequestSchema = z.object({
  query: z.string(),
  type: z.string().optional(),
  limit: z.number().int().optional(),
  properties: z.array(z.object({ pid: z.string().min(1), v: PropertyValueSchema })).optional(),
  type_strict: z.enum(["any", "all", "should"]).optional(),
});

export const QueryBatchSchema = z.record(z.string(), QueryRequestSchema);

export const ExtendRequestSchema = z.object({
  ids: z.array(z.string().min(1)),
  properties: z.array(z.object({ id: z.string().min(1) })),
});

export type QueryBatch = z.infer<typeof QueryBatchSchema>;
export type ExtendRequest = z.infer<typeof ExtendRequestSchema>;

// --- Response shapes ---

export interface SuggestedEntity {
  id: string;
  name: string;
  description?: string;
  type: ManifestType[];
}

export interface SuggestedItem {
  id: string;
  name: string;
  description?: string;
}

export interface SuggestResponse<T> {
  result: T[];
}

export interface PropertyListing {
  type: string;
  limit: number;
  properties: SuggestedItem[];
}

export type ExtendCell =
  | { str: string }
  | { int: number }
  | { float: number }
  | { bool: boolean }
  | { id: string; name: string };

export interface ExtendResponse {
  meta: SuggestedItem[];
  rows: Record<string, Record<string, ExtendCell[]>>;
}

function toItem(item: { id: string; name: string; description?: string }): SuggestedItem {
  return item.description ? { id: item.id, name: item.name, description: item.description } : { id: item.id, name: item.name };
}

function toExtendCell(value: PropertyValue): ExtendCell {
  if (isEntityReference(value)) return { id: value.id, name: value.name ?? value.id };
  if (typeof value === "boolean") return { bool: value };
  if (typeof value === "number") return Number.isInteger(value) ? { int: value } : { float: value };
  return { str: value };
}

/** Prefix matches first; a substring search only when nothing starts with the text. */
function prefixThenContains<T extends { name: string }>(items: T[], text: string, limit: number): T[] {
  const needle = text.toLowerCase();
  const prefixed = items.filter((i) => i.name.toLowerCase().startsWith(needle));
  const found = prefixed.length > 0 ? prefixed : items.filter((i) => i.name.toLowerCase().includes(needle));
  return found.slice(0, limit);
}

/**
 * Reconciliation operations over one EntityStore, independent of transport.
 * The HTTP bridge, the MCP server and the CLI all go through this class.
 */
export class ReconService {
  private manifestCache?: Manifest;

  constructor(
    public readonly store: EntityStore,
    private readonly publicUrl: string,
    private readonly prefix: string,
  ) {}

  manifest(): Manifest {
    this.manifestCache ??= buildManifest(this.store, this.publicUrl, this.prefix);
    return this.manifestCache;
  }

  /** Runs every query of a batch; the batch fails as a whole if one query fails. */
  async queryBatch(batch: QueryBatch): Promise<Record<string, { result: QueryResponse["result"] }>> {
    const keys = Object.keys(batch);
    logger.debug(`Reconciling batch of ${keys.length} queries`);
    const responses = await Promise.all(
      keys.map((key) => {
        const q = batch[key];
        return q ? this.store.query({ ...q, id: key }) : Promise.resolve({ id: key, result: [] });
      }),
    );
    const out: Record<string, { result: QueryResponse["result"] }> = {};
    for (const r of responses) out[r.id] = { result: r.result };
    return out;
  }

  async suggestEntities(prefix: string, limit = SUGGEST_LIMIT): Promise<SuggestResponse<SuggestedEntity>> {
    const entities = await this.store.queryPrefix(prefix, limit);
    return {
      result: entities.map((e) => {
        const s: SuggestedEntity = { id: e.id, name: e.name, type: e.types.map(toManifestType) };
        if (e.description) s.description = e.description;
        return s;
      }),
    };
  }

  suggestTypes(prefix: string, limit = SUGGEST_LIMIT): SuggestResponse<SuggestedItem> {
    return { result: prefixThenContains(this.store.types(), prefix, limit).map(toItem) };
  }

  suggestProperties(prefix: string, limit = SUGGEST_LIMIT): SuggestResponse<SuggestedItem> {
    return { result: prefixThenContains(this.allProperties(), prefix, limit).map(toItem) };
  }

  listProperties(typeId: string, limit?: number): PropertyListing {
    const all = this.store.propertiesFor(typeId);
    const max = limit !== undefined && limit > 0 ? Math.floor(limit) : all.length;
    return { type: typeId, limit: max, properties: all.slice(0, max).map(toItem) };
  }

  async entity(id: string): Promise<Entity> {
    const entity = await this.store.getEntity(id);
    if (!entity) throw new NotFoundError(`Entity '${id}' not found`);
    return entity;
  }

  async extend(request: ExtendRequest): Promise<ExtendResponse> {
    const known = new Map(this.allProperties().map((p) => [p.id, p]));
    const meta = request.properties.map((p) => toItem(known.get(p.id) ?? { id: p.id, name: p.id }));

    const rows: ExtendResponse["rows"] = {};
    for (const id of request.ids) {
      const entity = await this.entity(id);
      const row: Record<string, ExtendCell[]> = {};
      for (const { id: pid } of request.properties) {
        row[pid] = (entity.properties[pid] ?? []).map(toExtendCell);
      }
      rows[id] = row;
    }
    return { meta, rows };
  }

  private allProperties(): Property[] {
    const seen = new Map<string, Property>();
    for (const t of this.store.types()) {
      for (const p of this.store.propertiesFor(t.id)) {
        if (!seen.has(p.id)) seen.set(p.id, p);
      }
    }
    return Array.from(seen.values());
  }
}
