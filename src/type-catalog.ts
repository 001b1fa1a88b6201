import { composeEntityId } from "./entity-id.js";
import { createLogger } from "./logger.js";
import { Property, Type } from "./types.js";

const logger = createLogger("TypeCatalog");

/** Pseudo-type marking a row that defines a Property instead of an Entity. */
export const PROPERTY_PSEUDO_TYPE = "property";

export function splitTypeList(list: string): string[] {
  return list.split(",").map((t) => t.trim()).filter((t) => t.length > 0);
}

export function isPropertyRow(typeIds: string[]): boolean {
  return typeIds.includes(PROPERTY_PSEUDO_TYPE);
}

/**
 * Frozen catalog of types and per-type properties. Built once by a loader and
 * shared by reference; it has no mutators after construction.
 */
export class TypeCatalog {
  private readonly types: ReadonlyMap<string, Type>;
  private readonly propertiesByType: ReadonlyMap<string, readonly Property[]>;
  private readonly placeholders = new Set<string>();
  readonly defaultTypeId: string;

  constructor(types: Type[], properties: Array<{ property: Property; typeIds: string[] }>, defaultTypeId?: string) {
    const typeMap = new Map<string, Type>();
    for (const t of types) {
      typeMap.set(t.id, Object.freeze({ ...t }));
    }

    const byType = new Map<string, Property[]>();
    for (const { property, typeIds } of properties) {
      const frozen = Object.freeze({ ...property });
      for (const typeId of typeIds) {
        const list = byType.get(typeId) ?? [];
        if (!list.some((p) => p.id === frozen.id)) list.push(frozen);
        byType.set(typeId, list);
      }
    }
    for (const list of byType.values()) Object.freeze(list);

    this.types = typeMap;
    this.propertiesByType = byType;
    this.defaultTypeId = defaultTypeId ?? types[0]?.id ?? "";
  }

  allTypes(): Type[] {
    return Array.from(this.types.values());
  }

  getType(id: string): Type | undefined {
    return this.types.get(id);
  }

  propertiesFor(typeId: string): Property[] {
    return [...(this.propertiesByType.get(typeId) ?? [])];
  }

  allProperties(): Property[] {
    const seen = new Map<string, Property>();
    for (const list of this.propertiesByType.values()) {
      for (const p of list) {
        if (!seen.has(p.id)) seen.set(p.id, p);
      }
    }
    return Array.from(seen.values());
  }

  /** Type ids for a row, with an empty list falling back to the default type. */
  resolveTypeIds(list: string): string[] {
    const ids = splitTypeList(list);
    if (ids.length === 0 && this.defaultTypeId !== "") return [this.defaultTypeId];
    return ids;
  }

  /** Types for ids; an undeclared id gets a placeholder named after itself. */
  resolveTypes(typeIds: string[]): Type[] {
    return typeIds.map((id) => {
      const known = this.types.get(id);
      if (known) return known;
      if (!this.placeholders.has(id)) {
        this.placeholders.add(id);
        logger.warn(`Undeclared type '${id}' referenced by an entity`);
      }
      return { id, name: id };
    });
  }

  /** Composite id of a record whose resolved type list is `typeIds`. */
  entityId(rawKey: string, typeIds: string[]): string {
    return composeEntityId(typeIds[0] ?? "", rawKey);
  }
}
