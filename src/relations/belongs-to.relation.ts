import type { QueryBuilderContract } from "../contracts";
import type { ChildModel, Model } from "../model/model";
import { Relation } from "./relation";

/**
 * Inverse relation, `parent.foreignKey` references `related.ownerKey`.
 */
export class BelongsToRelation extends Relation<Model | null> {
  public readonly type = "belongsTo";

  public readonly ownerKey: string;

  public constructor(
    parent: Model,
    related: ChildModel<Model> | string,
    public readonly foreignKey: string,
    ownerKey?: string,
  ) {
    super(parent, related);
    this.ownerKey = ownerKey ?? this.related.primaryKey;
  }

  public query(): QueryBuilderContract<Model> {
    return this.related.query().where(this.ownerKey, this.parent.get(this.foreignKey));
  }

  public async getResults(): Promise<Model | null> {
    if (this.parent.get(this.foreignKey) == null) return null;

    return this.query().first();
  }
}
