import type { QueryBuilderContract } from "../contracts";
import type { ChildModel, Model } from "../model/model";
import { Relation } from "./relation";

/**
 * One-to-one relation, `related.foreignKey` references `parent.localKey`.
 * The first matching record wins.
 */
export class HasOneRelation extends Relation<Model | null> {
  public readonly type = "hasOne";

  public constructor(
    parent: Model,
    related: ChildModel<Model> | string,
    public readonly foreignKey: string,
    public readonly localKey: string,
  ) {
    super(parent, related);
  }

  public query(): QueryBuilderContract<Model> {
    return this.related.query().where(this.foreignKey, this.parent.get(this.localKey));
  }

  public async getResults(): Promise<Model | null> {
    if (this.parent.get(this.localKey) == null) return null;

    return this.query().first();
  }
}
