import { log } from "@warlock.js/logger";
import type { DriverContract, InsertResult, RawRecord } from "../../contracts";
import { MemoryQueryBuilder } from "./memory-query-builder";

export type MemoryDriverOptions = {
  /**
   * Driver name, used in logs
   *
   * @default "memory"
   */
  name?: string;
  /**
   * Column that receives the auto incremented id on insert
   *
   * @default "id"
   */
  primaryKey?: string;
};

/**
 * In-process driver that keeps every table as an array of records.
 *
 * Records inserted without a primary key receive an incremental numeric id,
 * per table.
 */
export class MemoryDriver implements DriverContract {
  public readonly name: string;

  protected readonly primaryKey: string;

  protected readonly tables = new Map<string, RawRecord[]>();

  protected readonly lastIds = new Map<string, number>();

  protected connected = false;

  public constructor(options: MemoryDriverOptions = {}) {
    this.name = options.name ?? "memory";
    this.primaryKey = options.primaryKey ?? "id";
  }

  public get isConnected(): boolean {
    return this.connected;
  }

  public async connect(): Promise<void> {
    if (this.connected) return;

    this.connected = true;

    log.success(`database.${this.name}`, "connection", "Connected to in-memory database");
  }

  public async disconnect(): Promise<void> {
    if (!this.connected) return;

    this.connected = false;

    log.warn(`database.${this.name}`, "connection", "Disconnected from in-memory database");
  }

  public async insert(table: string, document: RawRecord): Promise<InsertResult> {
    const record: RawRecord = { ...document };
    const currentId = record[this.primaryKey];
    const lastId = this.lastIds.get(table) ?? 0;

    if (currentId === undefined || currentId === null) {
      record[this.primaryKey] = lastId + 1;
      this.lastIds.set(table, lastId + 1);
    } else if (typeof currentId === "number" && currentId > lastId) {
      this.lastIds.set(table, currentId);
    }

    this.rows(table).push(record);

    return { document: { ...record } };
  }

  public queryBuilder(table: string): MemoryQueryBuilder<RawRecord> {
    return new MemoryQueryBuilder<RawRecord>(table, () => this.rows(table), (data) => data);
  }

  /**
   * Remove every record of the given table, or of all tables when omitted
   */
  public truncate(table?: string): void {
    if (table === undefined) {
      this.tables.clear();
      this.lastIds.clear();
      return;
    }

    this.tables.delete(table);
    this.lastIds.delete(table);
  }

  protected rows(table: string): RawRecord[] {
    let rows = this.tables.get(table);

    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }

    return rows;
  }
}
