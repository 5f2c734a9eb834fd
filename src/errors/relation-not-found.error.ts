import { DatabaseError } from "./database.error";

/**
 * Thrown when a relation name is neither dynamic, already loaded,
 * nor backed by a relationship method on the model.
 */
export class RelationNotFoundError extends DatabaseError {
  /**
   * The relation name that was requested.
   */
  public readonly relationName: string;

  /**
   * The model class the relation was requested on.
   */
  public readonly modelName: string;

  public constructor(relationName: string, modelName: string) {
    super(`Relation "${relationName}" not found on model "${modelName}".`);
    this.relationName = relationName;
    this.modelName = modelName;
  }
}
