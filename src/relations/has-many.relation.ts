import type { QueryBuilderContract } from "../contracts";
import type { ChildModel, Model } from "../model/model";
import { Relation } from "./relation";

/**
 * One-to-many relation, `related.foreignKey` references `parent.localKey`.
 */
export class HasManyRelation extends Relation<Model[]> {
  public readonly type = "hasMany";

  public constructor(
    parent: Model,
    related: ChildModel<Model> | string,
    public readonly foreignKey: string,
    public readonly localKey: string,
  ) {
    super(parent, related);
  }

  /**
   * Query of the related records
   */
  public query(): QueryBuilderContract<Model> {
    return this.related.query().where(this.foreignKey, this.parent.get(this.localKey));
  }

  public async getResults(): Promise<Model[]> {
    if (this.parent.get(this.localKey) == null) return [];

    return this.query().get();
  }
}
