import { DatabaseError } from "./database.error";

/**
 * Error thrown when a requested data source is not found in the registry.
 *
 * This can occur when:
 * - Attempting to retrieve a non-existent named data source
 * - Trying to get the default data source before any have been registered
 */
export class MissingDataSourceError extends DatabaseError {
  /**
   * The name of the data source that was not found (if applicable).
   */
  public readonly dataSourceName?: string;

  public constructor(message: string, dataSourceName?: string) {
    super(message);
    this.dataSourceName = dataSourceName;
  }
}
