import { dataSourceRegistry } from "../../src/data-source/data-source-registry";
import { MemoryDriver } from "../../src/drivers/memory";

/**
 * Register a fresh memory driver as the default data source.
 */
export function setupMemoryDatabase(): MemoryDriver {
  const driver = new MemoryDriver();

  dataSourceRegistry.clear();
  dataSourceRegistry.register({ name: "default", driver, isDefault: true });

  return driver;
}

/**
 * Insert the given records in order, ids are assigned by the driver when missing
 */
export async function seed(
  driver: MemoryDriver,
  table: string,
  records: Record<string, unknown>[],
): Promise<void> {
  for (const record of records) {
    await driver.insert(table, record);
  }
}
