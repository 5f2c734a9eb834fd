import type { ChildModel, Model } from "../model/model";
import { Relation, inferForeignKey } from "./relation";
import type { BelongsToManyOptions } from "./types";

/**
 * Many-to-many relation through a pivot table.
 *
 * The pivot table is read first, then the related records are fetched
 * with a single where-in query, keeping the pivot order.
 */
export class BelongsToManyRelation extends Relation<Model[]> {
  public readonly type = "belongsToMany";

  public readonly pivot: string;

  /**
   * Pivot column referencing the parent
   */
  public readonly pivotLocalColumn: string;

  /**
   * Pivot column referencing the related model
   */
  public readonly pivotForeignColumn: string;

  public readonly parentKey: string;

  public readonly relatedKey: string;

  public constructor(
    parent: Model,
    related: ChildModel<Model> | string,
    options: BelongsToManyOptions,
  ) {
    super(parent, related);
    this.pivot = options.pivot;
    this.pivotLocalColumn = options.localKey ?? inferForeignKey(parent.self().name);
    this.pivotForeignColumn = options.foreignKey ?? inferForeignKey(this.related.name);
    this.parentKey = options.pivotLocalKey ?? "id";
    this.relatedKey = options.pivotForeignKey ?? "id";
  }

  public async getResults(): Promise<Model[]> {
    const parentValue = this.parent.get(this.parentKey);

    if (parentValue == null) return [];

    const pivotRecords = await this.parent
      .self()
      .getDataSource()
      .driver.queryBuilder(this.pivot)
      .where(this.pivotLocalColumn, parentValue)
      .get();

    const relatedIds = [...new Set(pivotRecords.map((record) => record[this.pivotForeignColumn]))];

    if (relatedIds.length === 0) return [];

    const relatedRecords = await this.related.query().whereIn(this.relatedKey, relatedIds).get();

    const relatedById = new Map<unknown, Model>();

    for (const record of relatedRecords) {
      relatedById.set(record.get(this.relatedKey), record);
    }

    return relatedIds.flatMap((id) => {
      const record = relatedById.get(id);
      return record ? [record] : [];
    });
  }
}
