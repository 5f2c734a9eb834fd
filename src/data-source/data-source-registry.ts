import { MissingDataSourceError } from "../errors/missing-data-source.error";
import { DataSource, type DataSourceOptions } from "./data-source";

/**
 * Data sources models read their driver from.
 *
 * Models name their source through `static dataSource`, or use the default one.
 */
class DataSourceRegistry {
  private readonly sources = new Map<string, DataSource>();

  private defaultSource?: DataSource;

  /**
   * Register a new data source.
   *
   * The first registered source becomes the default unless a later one
   * is flagged with `isDefault`. Registering a name again replaces it.
   */
  public register(options: DataSourceOptions): DataSource {
    const source = new DataSource(options);

    this.sources.set(source.name, source);

    if (source.isDefault || !this.defaultSource) {
      this.defaultSource = source;
    }

    return source;
  }

  /**
   * Forget every data source, including the default one
   */
  public clear(): void {
    this.defaultSource = undefined;
    this.sources.clear();
  }

  /**
   * Get a data source by name, or the default one when no name is given.
   *
   * @throws MissingDataSourceError
   */
  public get(name?: string): DataSource {
    if (name === undefined) {
      if (!this.defaultSource) {
        throw new MissingDataSourceError("No default data source registered.");
      }

      return this.defaultSource;
    }

    const source = this.sources.get(name);

    if (!source) {
      throw new MissingDataSourceError(`Data source "${name}" is not registered.`, name);
    }

    return source;
  }
}

export const dataSourceRegistry = new DataSourceRegistry();
