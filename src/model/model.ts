import { get, merge, only, set } from "@mongez/reinforcements";
import { log } from "@warlock.js/logger";
import { getDatabaseDebugLevel } from "../config";
import type { QueryBuilderContract, RawRecord } from "../contracts";
import type { DataSource } from "../data-source/data-source";
import { dataSourceRegistry } from "../data-source/data-source-registry";
import { InvalidRelationshipContractError } from "../errors/invalid-relationship-contract.error";
import { RelationNotFoundError } from "../errors/relation-not-found.error";
import { BelongsToManyRelation } from "../relations/belongs-to-many.relation";
import { BelongsToRelation } from "../relations/belongs-to.relation";
import { DynamicRelationResolver } from "../relations/dynamic-relation-resolver";
import { HasManyRelation } from "../relations/has-many.relation";
import { HasOneRelation } from "../relations/has-one.relation";
import { Relation, inferForeignKey, isRelation } from "../relations/relation";
import { RelationLoader } from "../relations/relation-loader";
import type {
  BelongsToManyOptions,
  DynamicRelationType,
  DynamicRelationsOptions,
  LoadedRelationResult,
  LoadedRelationsMap,
  RelationConstraints,
  RelationDefinition,
  RelationDefinitions,
} from "../relations/types";
import {
  getAllModelsFromRegistry,
  getModelFromRegistry,
  resolveModelClass,
} from "./register-model";

export type ChildModel<TModel extends Model> = (new (...args: any[]) => TModel) &
  Pick<
    typeof Model,
    | "table"
    | "primaryKey"
    | "dataSource"
    | "relations"
    | "dynamicRelations"
    | "getDataSource"
    | "query"
    | "find"
    | "all"
    | "create"
    | "hydrate"
    | "loadRelations"
    | "isDynamicRelation"
    | "dynamicRelationResolver"
  >;

/**
 * Generic schema type representing the structure of model data.
 */
export type ModelSchema = Record<string, any>;

/**
 * Static helpers that can be reached through `callRelation()`.
 */
const FORWARDED_STATIC_HELPERS = ["isDynamicRelation"] as const;

type ForwardedStaticHelper = (typeof FORWARDED_STATIC_HELPERS)[number];

function isForwardedStaticHelper(name: string): name is ForwardedStaticHelper {
  return (FORWARDED_STATIC_HELPERS as readonly string[]).includes(name);
}

/**
 * Relation constructors a dynamic relation dispatches to, keyed by relation type.
 */
const dynamicRelationConstructors: Record<
  DynamicRelationType,
  (parent: Model, model: string, key: string) => Relation
> = {
  hasMany: (parent, model, key) => parent.hasMany(model, key),
  hasOne: (parent, model, key) => parent.hasOne(model, key),
  belongsTo: (parent, model, key) => parent.belongsTo(model, key),
};

/**
 * One resolver per concrete model class, created on first use.
 */
const dynamicRelationResolvers = new WeakMap<object, DynamicRelationResolver>();

/**
 * Base class that powers all models.
 *
 * Provides:
 * - Value accessors with dot-notation support (get, set, has, merge, only)
 * - Relation descriptors (hasMany, hasOne, belongsTo, belongsToMany)
 * - Dynamic relations resolved by name from `static dynamicRelations`
 * - A per-instance cache of loaded relations
 *
 * @template TSchema - The shape of the model's underlying data
 *
 * @example
 * ```typescript
 * @RegisterModel()
 * class User extends Model {
 *   public static table = "users";
 *
 *   public static dynamicRelations: DynamicRelationsOptions = {
 *     relations: ["comments"],
 *   };
 *
 *   public posts() {
 *     return this.hasMany("Post", "author_id");
 *   }
 * }
 *
 * const user = await User.find(1);
 * const comments = await user.getAttribute("comments"); // App\Comment where user_id = 1
 * const posts = await user.getRelationValue("posts");
 * ```
 */
export abstract class Model<TSchema extends ModelSchema = ModelSchema> {
  /**
   * The database table or collection name associated with this model.
   *
   * Must be defined by each concrete model subclass.
   */
  public static table: string;

  /**
   * Data source reference for this model.
   *
   * Can be:
   * - A string name registered in the data-source registry
   * - A DataSource instance
   * - Undefined (falls back to the default data source)
   */
  public static dataSource?: string | DataSource;

  /**
   * Primary key field name used to identify records.
   *
   * @default "id"
   */
  public static primaryKey: string = "id";

  /**
   * Declarative relation definitions for this model.
   *
   * @example
   * ```typescript
   * class User extends Model {
   *   public static relations = {
   *     posts: hasMany("Post"),
   *     roles: belongsToMany("Role", { pivot: "user_roles" }),
   *   };
   * }
   * ```
   */
  public static relations: RelationDefinitions = {};

  /**
   * Dynamic relations of this model.
   *
   * Relations listed here need no method and no definition, the related model,
   * key and type are resolved from their name.
   *
   * @example
   * ```typescript
   * class User extends Model {
   *   public static dynamicRelations: DynamicRelationsOptions = {
   *     relations: ["comments", "profile"],
   *     types: { profile: "hasOne" },
   *   };
   * }
   * ```
   */
  public static dynamicRelations?: DynamicRelationsOptions;

  /**
   * Flag indicating whether this model instance represents a new (unsaved) record.
   */
  public isNew = true;

  /**
   * The raw mutable data backing this model instance.
   */
  public data: TSchema;

  /**
   * Map of loaded relations for this model instance.
   *
   * Populated by `load()`, `getRelationValue()` and `getAttribute()`.
   *
   * @example
   * ```typescript
   * await user.load("posts");
   * console.log(user.loadedRelations.get("posts")); // Post[]
   * ```
   */
  public loadedRelations: LoadedRelationsMap = new Map();

  /**
   * Relations currently being materialized, so concurrent reads share one query.
   */
  private readonly pendingRelations = new Map<string, Promise<LoadedRelationResult>>();

  /**
   * Constructs a new model instance with optional initial data.
   *
   * @example
   * ```typescript
   * const user = new User({ name: "Alice", email: "alice@example.com" });
   * ```
   */
  public constructor(initialData: Partial<TSchema> = {}) {
    this.data = { ...initialData } as TSchema;
  }

  /**
   * Get a model class by its name from the global registry.
   */
  public static getModel(name: string) {
    return getModelFromRegistry(name);
  }

  /**
   * Get all registered models from the global registry.
   */
  public static getAllModels() {
    return getAllModelsFromRegistry();
  }

  // ============================================================================
  // DATA ACCESSORS
  // ============================================================================

  /**
   * Get model id
   */
  public get id(): number {
    return this.get("id");
  }

  /**
   * Retrieves a field value from the model's data.
   *
   * Supports both top-level keys and dot-notation paths for nested access.
   *
   * @example
   * ```typescript
   * user.get("name"); // "Alice"
   * user.get("address.city", "Unknown"); // "Unknown" if address.city is missing
   * ```
   */
  public get<TKey extends keyof TSchema & string>(field: TKey): TSchema[TKey];
  public get<Type extends unknown = any>(field: string): Type;
  public get<Type extends unknown = any>(field: string, defaultValue: Type): Type;
  public get(field: string, defaultValue?: unknown): any {
    return get(this.data, field, defaultValue);
  }

  /**
   * Get only the values of the given fields
   */
  public only(fields: string[]): Record<string, unknown> {
    return only(this.data, fields);
  }

  /**
   * Sets a field value, dot-notation paths create nested objects.
   */
  public set(field: string, value: unknown): this {
    set(this.data, field, value);

    return this;
  }

  /**
   * Determine whether the given field exists in the model's data
   */
  public has(field: string): boolean {
    return get(this.data, field, undefined) !== undefined;
  }

  /**
   * Deep merge the given values into the model's data
   */
  public merge(values: Record<string, unknown>): this {
    this.data = merge(this.data, values) as TSchema;

    return this;
  }

  // ============================================================================
  // LOADED RELATIONS
  // ============================================================================

  /**
   * Lazily load one or more relations for this model instance.
   *
   * Dynamic relations and declarative definitions can be loaded, even with
   * dot-notation for nested relations.
   *
   * @example
   * ```typescript
   * await user.load("posts", "comments.author");
   * ```
   */
  public async load(...relations: string[]): Promise<this> {
    await this.self().loadRelations([this], relations);

    return this;
  }

  /**
   * Check if a relation has been loaded.
   */
  public isLoaded(relationName: string): boolean {
    return this.loadedRelations.has(relationName);
  }

  /**
   * Get a loaded relation by name.
   *
   * Returns undefined if the relation has not been loaded.
   */
  public getRelation<TRelation extends LoadedRelationResult = LoadedRelationResult>(
    relationName: string,
  ): TRelation | undefined;
  public getRelation(relationName: string): LoadedRelationResult | undefined {
    return this.loadedRelations.get(relationName);
  }

  /**
   * Store a loaded relation.
   *
   * The value is also exposed as a property of the instance, unless the
   * instance already has a member with that name.
   */
  public setRelation(relationName: string, value: LoadedRelationResult): this {
    this.loadedRelations.set(relationName, value);

    if (this.canExposeRelation(relationName)) {
      Object.defineProperty(this, relationName, {
        value,
        writable: true,
        configurable: true,
        enumerable: false,
      });
    }

    return this;
  }

  /**
   * Forget a loaded relation, the next read resolves it again
   */
  public unsetRelation(relationName: string): this {
    this.loadedRelations.delete(relationName);

    if (Object.getOwnPropertyDescriptor(this, relationName)?.enumerable === false) {
      Reflect.deleteProperty(this, relationName);
    }

    return this;
  }

  /**
   * A relation is exposed as a property when the name is free, declared
   * without a value, or already holds a previously exposed relation.
   */
  protected canExposeRelation(relationName: string): boolean {
    const descriptor = Object.getOwnPropertyDescriptor(this, relationName);

    if (!descriptor) return !(relationName in this);

    return descriptor.enumerable === false || descriptor.value === undefined;
  }

  // ============================================================================
  // RELATION DESCRIPTORS
  // ============================================================================

  /**
   * One-to-many relation
   *
   * @param model - Related model class or its registered name
   * @param foreignKey - Column of the related model, defaults to `{thisModelName}Id`
   * @param localKey - Column of this model, defaults to the primary key
   */
  public hasMany(
    model: ChildModel<Model> | string,
    foreignKey?: string,
    localKey?: string,
  ): HasManyRelation {
    return new HasManyRelation(
      this,
      model,
      foreignKey ?? inferForeignKey(this.self().name),
      localKey ?? this.getPrimaryKey(),
    );
  }

  /**
   * One-to-one relation where the foreign key is on the related model
   */
  public hasOne(
    model: ChildModel<Model> | string,
    foreignKey?: string,
    localKey?: string,
  ): HasOneRelation {
    return new HasOneRelation(
      this,
      model,
      foreignKey ?? inferForeignKey(this.self().name),
      localKey ?? this.getPrimaryKey(),
    );
  }

  /**
   * Inverse relation where the foreign key is on this model
   *
   * @param foreignKey - Column of this model, defaults to `{relatedModelName}Id`
   * @param ownerKey - Column of the related model, defaults to its primary key
   */
  public belongsTo(
    model: ChildModel<Model> | string,
    foreignKey?: string,
    ownerKey?: string,
  ): BelongsToRelation {
    const related = resolveModelClass(model);

    return new BelongsToRelation(
      this,
      related,
      foreignKey ?? inferForeignKey(related.name),
      ownerKey,
    );
  }

  /**
   * Many-to-many relation through a pivot table
   */
  public belongsToMany(
    model: ChildModel<Model> | string,
    options: BelongsToManyOptions,
  ): BelongsToManyRelation {
    return new BelongsToManyRelation(this, model, options);
  }

  // ============================================================================
  // DYNAMIC RELATIONS
  // ============================================================================

  /**
   * Get the dynamic relations resolver of this model class
   */
  public static dynamicRelationResolver(): DynamicRelationResolver {
    let resolver = dynamicRelationResolvers.get(this);

    if (!resolver) {
      resolver = new DynamicRelationResolver(this.name, this.dynamicRelations);
      dynamicRelationResolvers.set(this, resolver);
    }

    return resolver;
  }

  /**
   * Determine if the given name is handled as a dynamic relation.
   *
   * Aliases count as dynamic when the relation they stand for is dynamic.
   */
  public static isDynamicRelation(name: string): boolean {
    const resolver = this.dynamicRelationResolver();

    return resolver.isDynamic(name) || resolver.isDynamic(resolver.resolveAlias(name));
  }

  /**
   * Determine if the given name is handled as a dynamic relation
   */
  public isDynamicRelation(name: string): boolean {
    return this.self().isDynamicRelation(name);
  }

  /**
   * Build the relation descriptor of a dynamic relation.
   *
   * Calling it with the name of a dynamic relation is the same as calling
   * a relation method returning `this.hasMany(...)` or similar.
   * With any other name, the relation is resolved as a normal relation:
   * from the loaded relations first, then from a relation method, then from
   * the declarative `relations` map.
   *
   * @throws RelationNotFoundError
   */
  public async dynamicRelationProxy(name: string): Promise<Relation | LoadedRelationResult> {
    const resolver = this.self().dynamicRelationResolver();
    const relationName = resolver.resolveAlias(name);

    if (resolver.isDynamic(relationName)) {
      const model = resolver.resolveTargetEntity(relationName);
      const key = resolver.resolveKey(relationName);
      // the type is looked up by the requested name so aliases can have their own type
      const type = resolver.resolveType(name);

      if (getDatabaseDebugLevel() === "info") {
        log.info(
          "database.relations",
          "dynamic",
          `${this.self().name}.${name} resolved to ${type}(${model}, ${key})`,
        );
      }

      return dynamicRelationConstructors[type](this, model, key);
    }

    // Not resolving through getRelationValue() here, it would call this proxy again
    if (this.isLoaded(name)) {
      return this.loadedRelations.get(name) ?? null;
    }

    if (this.hasRelationshipMethod(name) || this.getRelationDefinition(name)) {
      return this.getRelationshipFromMethod(name, false);
    }

    throw new RelationNotFoundError(relationName, this.self().name);
  }

  /**
   * Call a relation by its name.
   *
   * - Forwarded static helpers (`isDynamicRelation`) are called on the model class
   * - Dynamic relations return their relation descriptor
   * - Otherwise the relation method of that name is called, or the descriptor
   *   of the declarative definition of that name is built
   *
   * @throws RelationNotFoundError when no relation matches
   * @throws InvalidRelationshipContractError when the relation method returns a non relation
   */
  public callRelation(name: ForwardedStaticHelper, relationName: string): Promise<boolean>;
  public callRelation(name: string): Promise<Relation | LoadedRelationResult>;
  public async callRelation(
    name: string,
    ...parameters: string[]
  ): Promise<boolean | Relation | LoadedRelationResult> {
    if (isForwardedStaticHelper(name)) {
      const [relationName = ""] = parameters;

      return this.self()[name](relationName);
    }

    if (this.isDynamicRelation(name)) {
      return this.dynamicRelationProxy(name);
    }

    if (!this.hasRelationshipMethod(name)) {
      return this.relationFromDefinition(name);
    }

    const relation = this.invokeRelationshipMethod(name);

    if (!isRelation(relation)) {
      throw new InvalidRelationshipContractError(name, this.self().name);
    }

    return relation;
  }

  /**
   * Read an attribute, resolving relations.
   *
   * Dynamic relations resolve to their (cached) value. Other names read the
   * model data, falling back to the relation method or declarative
   * definition of that name when the data has no such field.
   *
   * @example
   * ```typescript
   * await user.getAttribute("comments"); // Comment[]
   * await user.getAttribute("name"); // "Alice"
   * await user.getAttribute("posts"); // Post[], from the posts() method
   * ```
   */
  public async getAttribute(name: string): Promise<unknown> {
    if (this.isDynamicRelation(name)) {
      return this.getRelationValue(name);
    }

    const value: unknown = this.get(name);

    if (value !== undefined) return value;

    if (this.hasRelationshipMethod(name) || this.getRelationDefinition(name)) {
      return this.getRelationValue(name);
    }

    return value;
  }

  /**
   * Get the value of a relation, loading it at most once per instance.
   *
   * Relations are looked up, in order, in the loaded relations, the dynamic
   * relations, the relation methods and the declarative `relations` map.
   * Returns undefined if the name matches none of them.
   *
   * @throws InvalidRelationshipContractError when the relation method returns a non relation
   */
  public async getRelationValue(name: string): Promise<LoadedRelationResult | undefined> {
    if (this.isLoaded(name)) {
      return this.loadedRelations.get(name);
    }

    const pending = this.pendingRelations.get(name);

    if (pending) return pending;

    const useProxy = this.isDynamicRelation(name);

    if (!useProxy && !this.hasRelationshipMethod(name) && !this.getRelationDefinition(name)) {
      return undefined;
    }

    const loading = this.getRelationshipFromMethod(name, useProxy).finally(() => {
      this.pendingRelations.delete(name);
    });

    this.pendingRelations.set(name, loading);

    return loading;
  }

  /**
   * Resolve the relation descriptor of the given name, materialize it and
   * store the result in the loaded relations.
   *
   * @param useProxy - Resolve through `dynamicRelationProxy()` instead of a relation method
   */
  protected async getRelationshipFromMethod(
    name: string,
    useProxy = false,
  ): Promise<LoadedRelationResult> {
    const relation = await this.resolveRelationship(name, useProxy);

    if (!isRelation(relation)) {
      throw new InvalidRelationshipContractError(name, this.self().name);
    }

    const results = await relation.getResults();

    this.setRelation(name, results);

    return results;
  }

  /**
   * Get whatever the relation of the given name is built from:
   * the proxy, a relation method or a declarative definition
   */
  protected async resolveRelationship(name: string, useProxy: boolean): Promise<unknown> {
    if (useProxy) {
      return this.dynamicRelationProxy(name);
    }

    if (this.hasRelationshipMethod(name)) {
      return this.invokeRelationshipMethod(name);
    }

    return this.relationFromDefinition(name);
  }

  /**
   * Determine whether the model declares a relation method with the given name.
   *
   * Members of the base model are never treated as relation methods.
   */
  protected hasRelationshipMethod(name: string): boolean {
    if (name === "constructor" || name in Model.prototype) return false;

    return typeof Reflect.get(this, name) === "function";
  }

  /**
   * Call the relation method with the given name
   */
  protected invokeRelationshipMethod(name: string): unknown {
    const method: unknown = Reflect.get(this, name);

    if (typeof method !== "function") {
      throw new RelationNotFoundError(name, this.self().name);
    }

    const result: unknown = Reflect.apply(method, this, []);

    return result;
  }

  /**
   * Get the declarative relation definition of the given name
   */
  protected getRelationDefinition(name: string): RelationDefinition | undefined {
    const relations = this.self().relations;

    return Object.hasOwn(relations, name) ? relations[name] : undefined;
  }

  /**
   * Build the relation descriptor of a declarative relation definition
   *
   * @throws RelationNotFoundError if there is no definition for the name
   */
  protected relationFromDefinition(name: string): Relation {
    const definition = this.getRelationDefinition(name);

    if (!definition) {
      throw new RelationNotFoundError(name, this.self().name);
    }

    switch (definition.type) {
      case "hasMany":
        return this.hasMany(definition.model, definition.foreignKey, definition.localKey);
      case "hasOne":
        return this.hasOne(definition.model, definition.foreignKey, definition.localKey);
      case "belongsTo":
        return this.belongsTo(
          definition.model,
          definition.foreignKey ?? `${name}Id`,
          definition.localKey,
        );
      case "belongsToMany":
        if (!definition.pivot) {
          throw new Error(
            `belongsToMany relation "${name}" requires a pivot table. ` +
              `Make sure to specify the 'pivot' option.`,
          );
        }

        return this.belongsToMany(definition.model, {
          pivot: definition.pivot,
          localKey: definition.localKey,
          foreignKey: definition.foreignKey,
          pivotLocalKey: definition.pivotLocalKey,
          pivotForeignKey: definition.pivotForeignKey,
        });
    }
  }

  // ============================================================================
  // DATA SOURCE & QUERIES
  // ============================================================================

  /**
   * Get the data source of this model
   *
   * @throws MissingDataSourceError
   */
  public static getDataSource(): DataSource {
    const ref = this.dataSource;

    if (typeof ref === "string") {
      return dataSourceRegistry.get(ref);
    }

    return ref ?? dataSourceRegistry.get();
  }

  /**
   * Create a new query builder for this model, records are hydrated into models
   */
  public static query<TModel extends Model = Model>(
    this: ChildModel<TModel>,
  ): QueryBuilderContract<TModel> {
    return this.getDataSource()
      .driver.queryBuilder(this.table)
      .hydrate((data) => this.hydrate(data));
  }

  /**
   * Create a model instance from a stored record
   */
  public static hydrate<TModel extends Model = Model>(
    this: ChildModel<TModel>,
    data: RawRecord,
  ): TModel {
    const model = new this(data);
    model.isNew = false;

    return model;
  }

  /**
   * Find a record by its primary key
   */
  public static async find<TModel extends Model = Model>(
    this: ChildModel<TModel>,
    id: string | number,
  ): Promise<TModel | null> {
    return this.query().where(this.primaryKey, id).first();
  }

  /**
   * Get all records from the table
   *
   * @param filter - The filter to apply to the query
   */
  public static async all<TModel extends Model = Model>(
    this: ChildModel<TModel>,
    filter?: Record<string, unknown>,
  ): Promise<TModel[]> {
    const query = this.query();

    if (filter) {
      query.where(filter);
    }

    return query.get();
  }

  /**
   * Insert a new record and return its model
   */
  public static async create<TModel extends Model = Model>(
    this: ChildModel<TModel>,
    data: RawRecord,
  ): Promise<TModel> {
    const { document } = await this.getDataSource().driver.insert(this.table, data);

    return this.hydrate(document);
  }

  /**
   * Batch load relations for the given models
   *
   * @example
   * ```typescript
   * const users = await User.all();
   * await User.loadRelations(users, ["posts", "comments"]);
   * ```
   */
  public static async loadRelations<TModel extends Model = Model>(
    this: ChildModel<TModel>,
    models: TModel[],
    relations: string | string[],
    constraints?: RelationConstraints,
  ): Promise<void> {
    const loader = new RelationLoader(models, this);

    await loader.load(relations, constraints);
  }

  // ============================================================================
  // UTILITIES
  // ============================================================================

  /**
   * Get the model class of this instance
   */
  public self<TModel extends Model = this>(): ChildModel<TModel> {
    return this.constructor as any as ChildModel<TModel>;
  }

  /**
   * Get table name
   */
  public getTableName(): string {
    return this.self().table;
  }

  /**
   * Get primary key name
   */
  public getPrimaryKey(): string {
    return this.self().primaryKey;
  }

  /**
   * Data of the model with its loaded relations
   */
  public toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = { ...this.data };

    for (const [name, value] of this.loadedRelations) {
      json[name] = Array.isArray(value) ? value.map((model) => model.toJSON()) : value?.toJSON() ?? null;
    }

    return json;
  }
}
