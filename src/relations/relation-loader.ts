/**
 * @fileoverview Batch loading of relations.
 *
 * The RelationLoader loads a relation for many model instances with one query
 * per relation instead of one query per model.
 */

import { RelationNotFoundError } from "../errors/relation-not-found.error";
import type { ChildModel, Model } from "../model/model";
import { resolveModelClass } from "../model/register-model";
import { inferForeignKey } from "./relation";
import type {
  LoadedRelationResult,
  RelationConstraintCallback,
  RelationConstraints,
  RelationDefinition,
} from "./types";

/**
 * Loads relationships for one or more model instances.
 *
 * Relations are looked up in the model's dynamic relations, then in its
 * declarative `relations` map, so `comments` works the same whether it is declared
 * with `hasMany("Comment")` or listed in `dynamicRelations.relations`.
 *
 * @example
 * ```typescript
 * const users = await User.all();
 * const loader = new RelationLoader(users, User);
 *
 * await loader.load(["posts", "comments.author"]);
 *
 * await loader.load("posts", {
 *   posts: (query) => query.where("isPublished", true),
 * });
 * ```
 */
export class RelationLoader<TModel extends Model = Model> {
  public constructor(
    private readonly models: TModel[],
    private readonly modelClass: ChildModel<TModel>,
  ) {}

  /**
   * Loads one or more relations for all model instances.
   *
   * @throws RelationNotFoundError if a relation is neither declared nor dynamic
   */
  public async load(
    relations: string | string[],
    constraints?: RelationConstraints,
  ): Promise<void> {
    if (this.models.length === 0) {
      return;
    }

    const relationNames = Array.isArray(relations) ? relations : [relations];

    for (const relationName of relationNames) {
      const constraint = constraints?.[relationName];
      const callbackConstraint = typeof constraint === "function" ? constraint : undefined;

      await this.loadRelation(relationName, callbackConstraint);
    }
  }

  /**
   * Loads a single relation, nested relations are separated by dots.
   */
  private async loadRelation(name: string, constraint?: RelationConstraintCallback): Promise<void> {
    const [rootRelation, ...remainingPath] = name.split(".");

    const definition = this.getRelationDefinition(rootRelation);

    if (!definition) {
      throw new RelationNotFoundError(rootRelation, this.modelClass.name);
    }

    const RelatedModel = resolveModelClass(definition.model);

    // the constraint targets the last segment of the path
    const rootConstraint = remainingPath.length === 0 ? constraint : undefined;

    switch (definition.type) {
      case "hasMany":
        await this.loadHasMany(rootRelation, RelatedModel, definition, rootConstraint);
        break;

      case "hasOne":
        await this.loadHasOne(rootRelation, RelatedModel, definition, rootConstraint);
        break;

      case "belongsTo":
        await this.loadBelongsTo(rootRelation, RelatedModel, definition, rootConstraint);
        break;

      case "belongsToMany":
        await this.loadBelongsToMany(rootRelation, RelatedModel, definition, rootConstraint);
        break;
    }

    if (remainingPath.length > 0) {
      await this.loadNestedRelations(rootRelation, RelatedModel, remainingPath, constraint);
    }
  }

  private async loadHasMany(
    name: string,
    RelatedModel: ChildModel<Model>,
    definition: RelationDefinition,
    constraint?: RelationConstraintCallback,
  ): Promise<void> {
    const localKey = definition.localKey ?? this.modelClass.primaryKey;
    const foreignKey = definition.foreignKey ?? inferForeignKey(this.modelClass.name);

    const localKeyValues = this.collectKeyValues(localKey);

    if (localKeyValues.length === 0) {
      this.setRelationOnModels(name, () => []);
      return;
    }

    const query = RelatedModel.query().whereIn(foreignKey, localKeyValues);

    constraint?.(query);

    const recordsByForeignKey = this.groupBy(await query.get(), foreignKey);

    this.setRelationOnModels(name, (model) => recordsByForeignKey.get(model.get(localKey)) ?? []);
  }

  private async loadHasOne(
    name: string,
    RelatedModel: ChildModel<Model>,
    definition: RelationDefinition,
    constraint?: RelationConstraintCallback,
  ): Promise<void> {
    const localKey = definition.localKey ?? this.modelClass.primaryKey;
    const foreignKey = definition.foreignKey ?? inferForeignKey(this.modelClass.name);

    const localKeyValues = this.collectKeyValues(localKey);

    if (localKeyValues.length === 0) {
      this.setRelationOnModels(name, () => null);
      return;
    }

    const query = RelatedModel.query().whereIn(foreignKey, localKeyValues);

    constraint?.(query);

    const recordsByForeignKey = new Map<unknown, Model>();

    for (const record of await query.get()) {
      const foreignValue = record.get(foreignKey);

      // first match wins
      if (!recordsByForeignKey.has(foreignValue)) {
        recordsByForeignKey.set(foreignValue, record);
      }
    }

    this.setRelationOnModels(name, (model) => recordsByForeignKey.get(model.get(localKey)) ?? null);
  }

  private async loadBelongsTo(
    name: string,
    RelatedModel: ChildModel<Model>,
    definition: RelationDefinition,
    constraint?: RelationConstraintCallback,
  ): Promise<void> {
    const foreignKey = definition.foreignKey ?? `${name}Id`;
    const ownerKey = definition.localKey ?? RelatedModel.primaryKey;

    const foreignKeyValues = this.collectKeyValues(foreignKey);

    if (foreignKeyValues.length === 0) {
      this.setRelationOnModels(name, () => null);
      return;
    }

    const query = RelatedModel.query().whereIn(ownerKey, foreignKeyValues);

    constraint?.(query);

    const recordsByOwnerKey = new Map<unknown, Model>();

    for (const record of await query.get()) {
      recordsByOwnerKey.set(record.get(ownerKey), record);
    }

    this.setRelationOnModels(name, (model) => recordsByOwnerKey.get(model.get(foreignKey)) ?? null);
  }

  private async loadBelongsToMany(
    name: string,
    RelatedModel: ChildModel<Model>,
    definition: RelationDefinition,
    constraint?: RelationConstraintCallback,
  ): Promise<void> {
    if (!definition.pivot) {
      throw new Error(
        `belongsToMany relation "${name}" requires a pivot table. ` +
          `Make sure to specify the 'pivot' option.`,
      );
    }

    const parentKey = definition.pivotLocalKey ?? "id";
    const relatedKey = definition.pivotForeignKey ?? "id";
    const pivotLocalColumn = definition.localKey ?? inferForeignKey(this.modelClass.name);
    const pivotForeignColumn = definition.foreignKey ?? inferForeignKey(RelatedModel.name);

    const parentKeyValues = this.collectKeyValues(parentKey);

    if (parentKeyValues.length === 0) {
      this.setRelationOnModels(name, () => []);
      return;
    }

    const pivotRecords = await this.modelClass
      .getDataSource()
      .driver.queryBuilder(definition.pivot)
      .whereIn(pivotLocalColumn, parentKeyValues)
      .get();

    if (pivotRecords.length === 0) {
      this.setRelationOnModels(name, () => []);
      return;
    }

    const relatedIds = [...new Set(pivotRecords.map((pivot) => pivot[pivotForeignColumn]))];

    const relatedQuery = RelatedModel.query().whereIn(relatedKey, relatedIds);

    constraint?.(relatedQuery);

    const relatedById = new Map<unknown, Model>();

    for (const record of await relatedQuery.get()) {
      relatedById.set(record.get(relatedKey), record);
    }

    const relationshipMap = new Map<unknown, Model[]>();

    for (const pivot of pivotRecords) {
      const relatedRecord = relatedById.get(pivot[pivotForeignColumn]);

      if (!relatedRecord) continue;

      const localValue = pivot[pivotLocalColumn];
      const records = relationshipMap.get(localValue) ?? [];

      records.push(relatedRecord);
      relationshipMap.set(localValue, records);
    }

    this.setRelationOnModels(name, (model) => relationshipMap.get(model.get(parentKey)) ?? []);
  }

  /**
   * Loads the remaining path on the models the parent relation loaded.
   */
  private async loadNestedRelations(
    parentRelation: string,
    RelatedModel: ChildModel<Model>,
    remainingPath: string[],
    constraint?: RelationConstraintCallback,
  ): Promise<void> {
    const relatedModels: Model[] = [];

    for (const model of this.models) {
      const loaded = model.getRelation(parentRelation);

      if (Array.isArray(loaded)) {
        relatedModels.push(...loaded);
      } else if (loaded) {
        relatedModels.push(loaded);
      }
    }

    if (relatedModels.length === 0) {
      return;
    }

    const nextRelation = remainingPath.join(".");

    await new RelationLoader(relatedModels, RelatedModel).load(
      nextRelation,
      constraint ? { [nextRelation]: constraint } : undefined,
    );
  }

  /**
   * Dynamic relation first, then the declarative definition of that name,
   * the same order `Model.getRelationValue()` follows
   */
  private getRelationDefinition(name: string): RelationDefinition | undefined {
    const dynamicDefinition = this.modelClass.dynamicRelationResolver().describe(name);

    if (dynamicDefinition) return dynamicDefinition;

    const relations = this.modelClass.relations;

    return Object.hasOwn(relations, name) ? relations[name] : undefined;
  }

  /**
   * Unique, non null values of the given key across all models
   */
  private collectKeyValues(key: string): unknown[] {
    const values = new Set<unknown>();

    for (const model of this.models) {
      const value: unknown = model.get(key);

      if (value !== undefined && value !== null) {
        values.add(value);
      }
    }

    return [...values];
  }

  private groupBy(records: Model[], key: string): Map<unknown, Model[]> {
    const groups = new Map<unknown, Model[]>();

    for (const record of records) {
      const keyValue: unknown = record.get(key);
      const group = groups.get(keyValue) ?? [];

      group.push(record);
      groups.set(keyValue, group);
    }

    return groups;
  }

  private setRelationOnModels(name: string, getter: (model: TModel) => LoadedRelationResult): void {
    for (const model of this.models) {
      model.setRelation(name, getter(model));
    }
  }
}
