import type { DynamicRelationType } from "./relations/types";

export type DatabaseConfigurations = {
  /**
   * Debug level
   * Could be one of the following values: `error`, `warn`, `info`
   * When set to `info`, relation resolution is logged
   * @default `warn`
   */
  debugLevel?: "error" | "warn" | "info";
  /**
   * Global defaults for dynamic relations
   * Every model can override them through its own `dynamicRelations` options
   */
  dynamicRelations?: {
    /**
     * Relation type used when a dynamic relation has no type override
     *
     * @default "hasMany"
     */
    defaultType?: DynamicRelationType;
    /**
     * Namespace prepended to the derived model name of a dynamic relation
     *
     * @default "App\\"
     */
    modelNamespace?: string;
    /**
     * Key used when a dynamic relation has no key override
     * If not set, it will be `{snake_case(ModelName)}_id`
     */
    defaultKey?: string;
  };
};
