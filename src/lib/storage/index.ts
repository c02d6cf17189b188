import type { StorageConfig } from "../config";
import { InMemoryParchiStore } from "./memory-store";
import { SqliteParchiStore } from "./sqlite-store";
import type { ParchiStore } from "./types";

/** Picks the backend once, at construction. */
export function createParchiStore(config: StorageConfig, options: { now?: () => Date } = {}): ParchiStore {
  switch (config.backend) {
    case "memory":
      return new InMemoryParchiStore(options);
    case "sqlite":
      return new SqliteParchiStore({ path: config.sqlitePath, now: options.now });
  }
}

export { InMemoryParchiStore } from "./memory-store";
export { SqliteParchiStore, type SqliteStoreOptions } from "./sqlite-store";
export { applyParchiUpdate, type ListOptions, type ParchiStore } from "./types";
