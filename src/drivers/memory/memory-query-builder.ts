import { areEqual, get } from "@mongez/reinforcements";
import type {
  HydrateCallback,
  OrderDirection,
  QueryBuilderContract,
  RawRecord,
  WhereObject,
  WhereOperator,
} from "../../contracts";

const WHERE_OPERATORS: readonly WhereOperator[] = ["=", "!=", ">", ">=", "<", "<=", "in", "notIn"];

type WhereClause = {
  field: string;
  operator: WhereOperator;
  value: unknown;
};

type OrderClause = {
  field: string;
  direction: OrderDirection;
};

/**
 * Shared state of a memory query, carried over when the builder is re-hydrated.
 */
type MemoryQueryState = {
  wheres: WhereClause[];
  orders: OrderClause[];
  limit?: number;
};

function isWhereOperator(value: unknown): value is WhereOperator {
  return typeof value === "string" && (WHERE_OPERATORS as readonly string[]).includes(value);
}

/**
 * Compare two scalar values.
 * Returns `null` when the values are not comparable (different types, objects...).
 */
function compareValues(left: unknown, right: unknown): number | null {
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() - right.getTime();
  }

  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }

  if (typeof left === "string" && typeof right === "string") {
    return left.localeCompare(right);
  }

  return null;
}

function matchesClause(record: RawRecord, clause: WhereClause): boolean {
  const recordValue = get(record, clause.field);
  const { value } = clause;

  switch (clause.operator) {
    case "=":
      return areEqual(recordValue, value);
    case "!=":
      return !areEqual(recordValue, value);
    case "in":
      return Array.isArray(value) && value.some((item) => areEqual(item, recordValue));
    case "notIn":
      return Array.isArray(value) && !value.some((item) => areEqual(item, recordValue));
  }

  const comparison = compareValues(recordValue, value);

  if (comparison === null) return false;

  switch (clause.operator) {
    case ">":
      return comparison > 0;
    case ">=":
      return comparison >= 0;
    case "<":
      return comparison < 0;
    case "<=":
      return comparison <= 0;
    default:
      return false;
  }
}

/**
 * Query builder for the memory driver.
 *
 * Clauses are evaluated against the current rows of the table when the query
 * is executed, so a builder always sees the latest inserted records.
 *
 * @template T - The type of records the builder resolves to
 */
export class MemoryQueryBuilder<T = RawRecord> implements QueryBuilderContract<T> {
  protected readonly state: MemoryQueryState;

  public constructor(
    public readonly table: string,
    protected readonly rows: () => RawRecord[],
    protected readonly hydrator: HydrateCallback<T>,
    state?: MemoryQueryState,
  ) {
    this.state = state ?? { wheres: [], orders: [] };
  }

  public where(field: string, value: unknown): this;
  public where(field: string, operator: WhereOperator, value: unknown): this;
  public where(conditions: WhereObject): this;
  public where(field: string | WhereObject, ...rest: unknown[]): this {
    if (typeof field !== "string") {
      for (const [key, value] of Object.entries(field)) {
        this.state.wheres.push({ field: key, operator: "=", value });
      }

      return this;
    }

    const [operatorOrValue, value] = rest;

    if (rest.length >= 2 && isWhereOperator(operatorOrValue)) {
      this.state.wheres.push({ field, operator: operatorOrValue, value });
    } else {
      this.state.wheres.push({ field, operator: "=", value: operatorOrValue });
    }

    return this;
  }

  public whereIn(field: string, values: unknown[]): this {
    this.state.wheres.push({ field, operator: "in", value: values });

    return this;
  }

  public orderBy(field: string, direction: OrderDirection = "asc"): this {
    this.state.orders.push({ field, direction });

    return this;
  }

  public limit(value: number): this {
    this.state.limit = value;

    return this;
  }

  public hydrate<TResult>(callback: HydrateCallback<TResult>): MemoryQueryBuilder<TResult> {
    return new MemoryQueryBuilder<TResult>(this.table, this.rows, callback, {
      wheres: [...this.state.wheres],
      orders: [...this.state.orders],
      limit: this.state.limit,
    });
  }

  public async get(): Promise<T[]> {
    return this.execute(this.state.limit).map((record, index) => this.hydrator(record, index));
  }

  public async first(): Promise<T | null> {
    const [record] = this.execute(1);

    return record ? this.hydrator(record, 0) : null;
  }

  public async count(): Promise<number> {
    return this.filter().length;
  }

  /**
   * Filter, order and limit the table rows.
   * Returned records are copies, mutating them does not touch the table.
   */
  protected execute(limit?: number): RawRecord[] {
    let records = this.filter();

    if (this.state.orders.length > 0) {
      records = [...records].sort((left, right) => this.compareRecords(left, right));
    }

    if (limit !== undefined) {
      const max = this.state.limit === undefined ? limit : Math.min(limit, this.state.limit);
      records = records.slice(0, max);
    }

    return records.map((record) => ({ ...record }));
  }

  protected filter(): RawRecord[] {
    return this.rows().filter((record) =>
      this.state.wheres.every((clause) => matchesClause(record, clause)),
    );
  }

  protected compareRecords(left: RawRecord, right: RawRecord): number {
    for (const { field, direction } of this.state.orders) {
      const comparison = compareValues(get(left, field), get(right, field)) ?? 0;

      if (comparison !== 0) {
        return direction === "asc" ? comparison : -comparison;
      }
    }

    return 0;
  }
}
