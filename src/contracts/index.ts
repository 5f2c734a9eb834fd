export type {
  DriverContract,
  InsertResult,
} from "./database-driver.contract";
export type {
  HydrateCallback,
  OrderDirection,
  QueryBuilderContract,
  RawRecord,
  WhereObject,
  WhereOperator,
} from "./query-builder.contract";
