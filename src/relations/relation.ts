import type { ChildModel, Model } from "../model/model";
import { resolveModelClass } from "../model/register-model";
import type { LoadedRelationResult, RelationType } from "./types";

/**
 * Base class of relation descriptors.
 *
 * A descriptor binds a parent model instance to a related model class and
 * knows how to fetch the related records; nothing is queried until
 * `getResults()` is called.
 *
 * @template TResult - What the relation materializes to
 */
export abstract class Relation<TResult extends LoadedRelationResult = LoadedRelationResult> {
  /**
   * The relation type
   */
  public abstract readonly type: RelationType;

  /**
   * The related model class
   */
  public readonly related: ChildModel<Model>;

  /**
   * @param parent - Model instance owning the relation
   * @param related - Related model class or its registered name
   * @throws ModelNotFoundError if the related model name is not registered
   */
  public constructor(
    public readonly parent: Model,
    related: ChildModel<Model> | string,
  ) {
    this.related = resolveModelClass(related);
  }

  /**
   * Execute the relation query and return the materialized value
   */
  public abstract getResults(): Promise<TResult>;
}

/**
 * Determine whether the given value is a relation descriptor
 */
export function isRelation(value: unknown): value is Relation {
  return value instanceof Relation;
}

/**
 * Infer a camel cased foreign key from a model name.
 *
 * @example
 * ```typescript
 * inferForeignKey("User"); // "userId"
 * ```
 */
export function inferForeignKey(modelName: string): string {
  return `${modelName.charAt(0).toLowerCase()}${modelName.slice(1)}Id`;
}
