import type { DriverContract } from "../contracts";

/**
 * Options used to register a data source.
 */
export type DataSourceOptions = {
  /**
   * Unique name of the data source
   */
  name: string;
  /**
   * Driver that executes the queries
   */
  driver: DriverContract;
  /**
   * Mark this data source as the default one
   */
  isDefault?: boolean;
};

/**
 * A named pairing of a driver and its settings.
 *
 * Models resolve their data source either by name, by direct reference
 * or by falling back to the default registered data source.
 */
export class DataSource {
  public readonly name: string;

  public readonly driver: DriverContract;

  public readonly isDefault: boolean;

  public constructor(options: DataSourceOptions) {
    this.name = options.name;
    this.driver = options.driver;
    this.isDefault = Boolean(options.isDefault);
  }
}
