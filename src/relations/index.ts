/**
 * @fileoverview Relations module.
 *
 * Relation descriptors, declarative helpers, dynamic relations resolution
 * and batch loading.
 *
 * @example
 * ```typescript
 * import { hasMany, belongsTo, Model } from "dynamic-relations";
 *
 * class User extends Model {
 *   public static relations = {
 *     posts: hasMany("Post"),
 *     organization: belongsTo("Organization"),
 *   };
 *
 *   public static dynamicRelations = dynamicRelations({
 *     relations: ["comments"],
 *   });
 * }
 * ```
 */

// Types
export type {
  BelongsToManyOptions,
  BelongsToOptions,
  DynamicRelationType,
  DynamicRelationsOptions,
  HasManyOptions,
  HasOneOptions,
  LoadedRelationResult,
  LoadedRelationsMap,
  RelationConstraintCallback,
  RelationConstraints,
  RelationDefinition,
  RelationDefinitions,
  RelationType,
} from "./types";

// Helper functions
export { belongsTo, belongsToMany, dynamicRelations, hasMany, hasOne } from "./helpers";

// Descriptors
export { Relation, inferForeignKey, isRelation } from "./relation";
export { BelongsToManyRelation } from "./belongs-to-many.relation";
export { BelongsToRelation } from "./belongs-to.relation";
export { HasManyRelation } from "./has-many.relation";
export { HasOneRelation } from "./has-one.relation";

// Dynamic relations
export {
  DEFAULT_DYNAMIC_RELATION_NAMESPACE,
  DEFAULT_DYNAMIC_RELATION_TYPE,
  DynamicRelationResolver,
} from "./dynamic-relation-resolver";

// Relation loader
export { RelationLoader } from "./relation-loader";
