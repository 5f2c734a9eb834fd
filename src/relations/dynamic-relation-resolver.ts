/**
 * @fileoverview Name resolution for dynamic relations.
 *
 * A dynamic relation is declared by name only, its related model, key and
 * type are derived from the model's `dynamicRelations` options, falling back
 * to the global configuration and then to the built-in defaults.
 */

import { getDatabaseConfig } from "../config";
import { qualifyModelName } from "../model/register-model";
import { modelNameToForeignKey, relationToModelName } from "../utils/inflection";
import type { DynamicRelationType, DynamicRelationsOptions, RelationDefinition } from "./types";

/**
 * Relation type used when neither the model nor the configuration define one
 */
export const DEFAULT_DYNAMIC_RELATION_TYPE: DynamicRelationType = "hasMany";

/**
 * Namespace used when neither the model nor the configuration define one
 */
export const DEFAULT_DYNAMIC_RELATION_NAMESPACE = "App\\";

function lookup<TValue>(
  map: Readonly<Record<string, TValue>> | undefined,
  key: string,
): TValue | undefined {
  return map && Object.hasOwn(map, key) ? map[key] : undefined;
}

/**
 * Resolves the definition of dynamic relations of one model class.
 *
 * One resolver exists per concrete model class, see `Model.dynamicRelationResolver()`.
 *
 * @example
 * ```typescript
 * const resolver = new DynamicRelationResolver("User", {
 *   relations: ["comments"],
 * });
 *
 * resolver.isDynamic("comments"); // true
 * resolver.resolveTargetEntity("comments"); // "App\\Comment"
 * resolver.resolveKey("comments"); // "user_id"
 * resolver.resolveType("comments"); // "hasMany"
 * ```
 */
export class DynamicRelationResolver {
  /**
   * Memoized default key
   */
  protected defaultKey?: string;

  public constructor(
    public readonly modelName: string,
    protected readonly options: DynamicRelationsOptions = {},
  ) {}

  /**
   * Names of all dynamic relations
   */
  public get relationNames(): readonly string[] {
    return this.options.relations ?? [];
  }

  /**
   * Get the relation name the given alias stands for.
   * Names that are not aliases are returned as is.
   */
  public resolveAlias(name: string): string {
    return lookup(this.options.aliases, name) ?? name;
  }

  /**
   * Determine if the given name is registered as a dynamic relation (exact match)
   */
  public isDynamic(name: string): boolean {
    return this.relationNames.includes(name);
  }

  /**
   * Get the key used to build the given relation
   */
  public resolveKey(name: string): string {
    return lookup(this.options.keys, name) ?? this.getDefaultKey();
  }

  /**
   * Get the relation type of the given relation
   */
  public resolveType(name: string): DynamicRelationType {
    return (
      lookup(this.options.types, name) ??
      this.options.defaultType ??
      getDatabaseConfig("dynamicRelations")?.defaultType ??
      DEFAULT_DYNAMIC_RELATION_TYPE
    );
  }

  /**
   * Get the registered model name the given relation points to.
   *
   * Unless defined in the `models` map, it is the namespace followed by
   * the singular, studly cased relation name.
   */
  public resolveTargetEntity(name: string): string {
    const model = lookup(this.options.models, name);

    if (model !== undefined) return model;

    return qualifyModelName(relationToModelName(name), this.namespace);
  }

  /**
   * Namespace used for derived model names
   */
  public get namespace(): string {
    return (
      this.options.namespace ??
      getDatabaseConfig("dynamicRelations")?.modelNamespace ??
      DEFAULT_DYNAMIC_RELATION_NAMESPACE
    );
  }

  /**
   * Get the key used by relations without an entry in the `keys` map.
   *
   * Computed once, then memoized.
   */
  public getDefaultKey(): string {
    if (this.defaultKey === undefined) {
      this.defaultKey =
        this.options.defaultKey ??
        getDatabaseConfig("dynamicRelations")?.defaultKey ??
        modelNameToForeignKey(this.modelName);
    }

    return this.defaultKey;
  }

  /**
   * Build a relation definition for the given name, or its aliased name.
   *
   * Returns undefined if the name is not a dynamic relation.
   */
  public describe(name: string): RelationDefinition | undefined {
    const relationName = this.resolveAlias(name);

    if (!this.isDynamic(relationName)) return undefined;

    return {
      type: this.resolveType(name),
      model: this.resolveTargetEntity(relationName),
      foreignKey: this.resolveKey(relationName),
    };
  }
}
