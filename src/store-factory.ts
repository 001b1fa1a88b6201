import { EntityStore } from "./entity-store.js";
import { loadFlatFile } from "./flatfile-loader.js";
import { SqliteStore } from "./sqlite-store.js";

export type StoreBackend = "sqlite" | "memory";

/** SQLite databases are recognised by name; everything else is a flat file. */
export function backendFor(location: string): StoreBackend {
  return location.toLowerCase().includes("sqlite") ? "sqlite" : "memory";
}

export async function openStore(location: string): Promise<EntityStore> {
  if (backendFor(location) === "sqlite") {
    return SqliteStore.open(location);
  }
  return loadFlatFile(location);
}
