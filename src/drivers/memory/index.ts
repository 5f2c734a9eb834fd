export { MemoryDriver, type MemoryDriverOptions } from "./memory-driver";
export { MemoryQueryBuilder } from "./memory-query-builder";
