/**
 * Ordering direction supported by query builders.
 */
export type OrderDirection = "asc" | "desc";

/**
 * Comparison operators accepted by `where()`.
 */
export type WhereOperator = "=" | "!=" | ">" | ">=" | "<" | "<=" | "in" | "notIn";

/**
 * Object-based where clause, every key is compared for equality.
 */
export type WhereObject = Record<string, unknown>;

/**
 * Raw record shape returned by drivers before hydration.
 */
export type RawRecord = Record<string, unknown>;

/**
 * Callback used to turn raw records into richer objects (usually models).
 */
export type HydrateCallback<TResult> = (data: RawRecord, index: number) => TResult;

/**
 * Query builder contract shared by every driver.
 *
 * Only the subset needed by the model layer and the relation descriptors
 * is part of the contract.
 *
 * @template T - The type of records the builder resolves to
 */
export interface QueryBuilderContract<T = RawRecord> {
  /**
   * Table (or collection) name the builder targets
   */
  readonly table: string;

  // ============================================================================
  // WHERE CLAUSES
  // ============================================================================

  /**
   * Add a where clause to the query.
   *
   * @example
   * // Simple equality
   * query.where('age', 18)
   *
   * // With operator
   * query.where('age', '>', 18)
   *
   * // Object-based
   * query.where({ age: 18, isActive: true })
   */
  where(field: string, value: unknown): this;
  where(field: string, operator: WhereOperator, value: unknown): this;
  where(conditions: WhereObject): this;

  /**
   * Add a where-in clause
   *
   * @example
   * query.whereIn('userId', [1, 2, 3])
   */
  whereIn(field: string, values: unknown[]): this;

  // ============================================================================
  // ORDERING & LIMITS
  // ============================================================================

  /**
   * Order results by the specified field and direction.
   *
   * @example
   * query.orderBy('createdAt', 'desc')
   */
  orderBy(field: string, direction?: OrderDirection): this;

  /**
   * Limit the number of results.
   */
  limit(value: number): this;

  // ============================================================================
  // HYDRATION
  // ============================================================================

  /**
   * Hydrate records after fetching is done successfully.
   *
   * Returns a builder carrying the same clauses whose results are produced
   * by the given callback.
   */
  hydrate<TResult>(callback: HydrateCallback<TResult>): QueryBuilderContract<TResult>;

  // ============================================================================
  // EXECUTION
  // ============================================================================

  /**
   * Execute the query and return all matching records.
   *
   * @example
   * const users = await User.query().where('isActive', true).get();
   */
  get(): Promise<T[]>;

  /**
   * Execute the query and return the first matching record.
   */
  first(): Promise<T | null>;

  /**
   * Count the records matching the query.
   */
  count(): Promise<number>;
}
