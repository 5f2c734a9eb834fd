/**
 * @fileoverview Relation type definitions.
 *
 * This module defines all the types needed for configuring model relationships,
 * both the declarative ones (`static relations`) and the dynamic ones
 * (`static dynamicRelations`).
 */

import type { QueryBuilderContract } from "../contracts";
import type { Model } from "../model/model";

// ============================================================================
// RELATION TYPES
// ============================================================================

/**
 * The type of relationship between models.
 *
 * - `hasOne`: One-to-one relationship where the foreign key is on the related model
 * - `hasMany`: One-to-many relationship where the foreign key is on the related model
 * - `belongsTo`: Inverse of hasOne/hasMany where the foreign key is on this model
 * - `belongsToMany`: Many-to-many relationship through a pivot table
 */
export type RelationType = "hasOne" | "hasMany" | "belongsTo" | "belongsToMany";

/**
 * Relation types a dynamic relation can resolve to.
 *
 * `belongsToMany` is left out as it can not be built from a single key.
 */
export type DynamicRelationType = Exclude<RelationType, "belongsToMany">;

// ============================================================================
// RELATION DEFINITION
// ============================================================================

/**
 * Complete definition of a model relationship.
 *
 * @example
 * ```typescript
 * const postsRelation: RelationDefinition = {
 *   type: "hasMany",
 *   model: "Post",
 *   foreignKey: "userId",
 *   localKey: "id",
 * };
 * ```
 */
export type RelationDefinition = {
  /**
   * The type of relationship.
   */
  readonly type: RelationType;

  /**
   * The name of the related model in the registry.
   * Models must be decorated with `@RegisterModel()` to be resolvable.
   */
  readonly model: string;

  /**
   * The foreign key field on the related model (for hasOne/hasMany)
   * or on this model (for belongsTo).
   *
   * For belongsToMany, this is the pivot column referencing the related model.
   */
  readonly foreignKey?: string;

  /**
   * The local key field on this model that the foreign key references.
   * For belongsTo, this is the owner key on the related model.
   *
   * @default primary key of the owning model
   */
  readonly localKey?: string;

  /**
   * The pivot table name (only for belongsToMany relationships).
   */
  readonly pivot?: string;

  /**
   * The primary key of this model that the pivot table references.
   */
  readonly pivotLocalKey?: string;

  /**
   * The primary key of the related model that the pivot table references.
   */
  readonly pivotForeignKey?: string;
};

// ============================================================================
// RELATION OPTIONS
// ============================================================================

export type HasManyOptions = {
  /**
   * The foreign key field on the related model.
   *
   * If not provided, defaults to `{thisModelName}Id` (e.g., `userId` for User model).
   */
  readonly foreignKey?: string;

  /**
   * The local key field on this model that the foreign key references.
   */
  readonly localKey?: string;
};

export type HasOneOptions = HasManyOptions;

export type BelongsToOptions = {
  /**
   * The foreign key field on this model that references the related model.
   *
   * If not provided, defaults to `{relationName}Id` (e.g., `authorId` for author relation).
   */
  readonly foreignKey?: string;

  /**
   * The primary key field on the related model.
   */
  readonly ownerKey?: string;
};

/**
 * Configuration options for a belongsToMany relationship.
 *
 * @example
 * ```typescript
 * tags: belongsToMany("Tag", {
 *   pivot: "post_tags",
 *   localKey: "postId",
 *   foreignKey: "tagId",
 * }),
 * ```
 */
export type BelongsToManyOptions = {
  /**
   * The pivot table name that connects the two models.
   */
  readonly pivot: string;

  /**
   * The column in the pivot table that references this model's primary key.
   *
   * If not provided, defaults to `{thisModelName}Id`.
   */
  readonly localKey?: string;

  /**
   * The column in the pivot table that references the related model's primary key.
   *
   * If not provided, defaults to `{relatedModelName}Id`.
   */
  readonly foreignKey?: string;

  /**
   * The primary key of this model that the pivot table references.
   *
   * @default "id"
   */
  readonly pivotLocalKey?: string;

  /**
   * The primary key of the related model that the pivot table references.
   *
   * @default "id"
   */
  readonly pivotForeignKey?: string;
};

// ============================================================================
// DYNAMIC RELATIONS
// ============================================================================

/**
 * Per-model configuration of dynamic relations.
 *
 * Every map is optional, missing entries fall back to the defaults.
 *
 * @example
 * ```typescript
 * class User extends Model {
 *   public static dynamicRelations: DynamicRelationsOptions = {
 *     relations: ["comments", "profile", "user_languages"],
 *     types: { profile: "hasOne" },
 *     keys: { comments: "author_id" },
 *     models: { user_languages: "App\\Language" },
 *     aliases: { languages: "user_languages" },
 *   };
 * }
 * ```
 */
export type DynamicRelationsOptions = {
  /**
   * Names of the relations that are resolved dynamically
   */
  readonly relations?: readonly string[];

  /**
   * relation name => key used to build the relation
   */
  readonly keys?: Readonly<Record<string, string>>;

  /**
   * relation name => relation type
   */
  readonly types?: Readonly<Record<string, DynamicRelationType>>;

  /**
   * relation name => registered model name
   */
  readonly models?: Readonly<Record<string, string>>;

  /**
   * alias => relation name
   */
  readonly aliases?: Readonly<Record<string, string>>;

  /**
   * Key used when the relation has no entry in `keys`.
   *
   * @default `{snake_case(ModelName)}_id`
   */
  readonly defaultKey?: string;

  /**
   * Type used when the relation has no entry in `types`.
   *
   * @default "hasMany"
   */
  readonly defaultType?: DynamicRelationType;

  /**
   * Namespace prepended to derived model names.
   *
   * @default "App\\"
   */
  readonly namespace?: string;
};

// ============================================================================
// CONSTRAINT AND CALLBACK TYPES
// ============================================================================

/**
 * Callback function to apply constraints when loading a relation.
 *
 * @example
 * ```typescript
 * await User.loadRelations(users, "posts", {
 *   posts: (query) => query.where("isPublished", true),
 * });
 * ```
 */
export type RelationConstraintCallback = (query: QueryBuilderContract<Model>) => void;

/**
 * Constraints to apply when loading relations, keyed by relation name.
 */
export type RelationConstraints = Record<string, boolean | RelationConstraintCallback>;

// ============================================================================
// LOADED RELATIONS STORAGE
// ============================================================================

/**
 * Type for the result of loading a relation.
 *
 * - For hasOne/belongsTo: A single model instance or null
 * - For hasMany/belongsToMany: An array of model instances
 */
export type LoadedRelationResult = Model | Model[] | null;

/**
 * Map that stores loaded relation data on a model instance.
 */
export type LoadedRelationsMap = Map<string, LoadedRelationResult>;

/**
 * A map of relation names to their definitions.
 *
 * This is the type for the static `relations` property on models.
 */
export type RelationDefinitions = Record<string, RelationDefinition>;
