/**
 * @fileoverview Helpers to declare relations in the static `relations` map.
 *
 * @example
 * ```typescript
 * class User extends Model {
 *   public static relations = {
 *     posts: hasMany("Post"),
 *     profile: hasOne("Profile"),
 *     organization: belongsTo("Organization", { foreignKey: "organizationId" }),
 *     roles: belongsToMany("Role", { pivot: "user_roles" }),
 *   };
 * }
 * ```
 */

import type {
  BelongsToManyOptions,
  BelongsToOptions,
  DynamicRelationsOptions,
  HasManyOptions,
  HasOneOptions,
  RelationDefinition,
} from "./types";

/**
 * One-to-many, the foreign key is stored on the related model.
 */
export function hasMany(model: string, options?: HasManyOptions): RelationDefinition {
  return {
    type: "hasMany",
    model,
    foreignKey: options?.foreignKey,
    localKey: options?.localKey,
  };
}

/**
 * One-to-one, the foreign key is stored on the related model.
 */
export function hasOne(model: string, options?: HasOneOptions): RelationDefinition {
  return {
    type: "hasOne",
    model,
    foreignKey: options?.foreignKey,
    localKey: options?.localKey,
  };
}

/**
 * Inverse of hasOne/hasMany, the foreign key is stored on this model.
 *
 * The owner key is kept in `localKey` of the definition.
 */
export function belongsTo(model: string, options?: BelongsToOptions): RelationDefinition {
  return {
    type: "belongsTo",
    model,
    foreignKey: options?.foreignKey,
    localKey: options?.ownerKey,
  };
}

/**
 * Many-to-many through a pivot table.
 */
export function belongsToMany(model: string, options: BelongsToManyOptions): RelationDefinition {
  return {
    type: "belongsToMany",
    model,
    pivot: options.pivot,
    localKey: options.localKey,
    foreignKey: options.foreignKey,
    pivotLocalKey: options.pivotLocalKey ?? "id",
    pivotForeignKey: options.pivotForeignKey ?? "id",
  };
}

/**
 * Declare the dynamic relations of a model.
 *
 * Returns the options as is, it only exists to get them type checked
 * without annotating the static property.
 *
 * @example
 * ```typescript
 * class User extends Model {
 *   public static dynamicRelations = dynamicRelations({
 *     relations: ["comments"],
 *   });
 * }
 * ```
 */
export function dynamicRelations(options: DynamicRelationsOptions): DynamicRelationsOptions {
  return options;
}
