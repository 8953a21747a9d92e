import type { CycleRepository } from "./CycleRepository";
import { InMemoryCycleRepository } from "./InMemoryCycleRepository";
import { PostgresCycleRepository } from "./PostgresCycleRepository";
import { configureDatabase } from "../database/connection";

// Repository Factory (CycleCast)
// - The ONLY place where the storage implementation is selected.
// - Selects PostgreSQL when a database URL is configured, otherwise falls back to in-memory.

let singleton: CycleRepository | undefined;

export function getCycleRepository(databaseUrl?: string): CycleRepository {
  if (!singleton) {
    if (databaseUrl) {
      console.log("[CycleCast] Using PostgreSQL repository");
      configureDatabase(databaseUrl);
      singleton = new PostgresCycleRepository();
    } else {
      console.log("[CycleCast] Using in-memory repository (no DATABASE_URL set)");
      singleton = new InMemoryCycleRepository();
    }
  }
  return singleton;
}
