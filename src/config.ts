import type { DatabaseConfigurations } from "./types";

let configurations: Partial<DatabaseConfigurations> = {};

export function setDatabaseConfigurations(databaseConfigurations: DatabaseConfigurations) {
  configurations = {
    ...configurations,
    ...databaseConfigurations,
  };
}

export function getDatabaseConfigurations(): DatabaseConfigurations {
  return configurations;
}

export function getDatabaseConfig<Key extends keyof DatabaseConfigurations>(
  key: Key,
): DatabaseConfigurations[Key] {
  return configurations[key];
}

export function getDatabaseDebugLevel(): NonNullable<DatabaseConfigurations["debugLevel"]> {
  return configurations.debugLevel || "warn";
}

/**
 * Reset configurations to their initial (empty) state
 */
export function resetDatabaseConfigurations() {
  configurations = {};
}
