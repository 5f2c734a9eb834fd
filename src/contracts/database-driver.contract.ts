import type { QueryBuilderContract, RawRecord } from "./query-builder.contract";

/** Result returned after insert operations. */
export type InsertResult<TDocument = RawRecord> = {
  document: TDocument;
};

/**
 * Unified driver contract used by the model layer.
 */
export interface DriverContract {
  /**
   * The name of the driver.
   *
   * Used for identification, logging, and debugging.
   *
   * @example "memory"
   */
  readonly name: string;

  /** Whether the underlying connection is currently established. */
  readonly isConnected: boolean;

  /** Establish the underlying connection. */
  connect(): Promise<void>;
  /** Close the underlying connection. */
  disconnect(): Promise<void>;

  /** Insert a single document/row into the given table. */
  insert(table: string, document: RawRecord): Promise<InsertResult>;

  /** Create a query builder for the given table. */
  queryBuilder(table: string): QueryBuilderContract<RawRecord>;
}
