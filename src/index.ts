// Configurations
export * from "./config";
export * from "./types";

// Contracts
export type * from "./contracts";

// Data Source
export * from "./data-source/data-source";
export * from "./data-source/data-source-registry";

// Errors
export * from "./errors";

// Models
export * from "./model/model";
export * from "./model/register-model";

// Relations
export * from "./relations";

// Memory Driver
export * from "./drivers/memory";

// Utilities
export * from "./utils/inflection";
