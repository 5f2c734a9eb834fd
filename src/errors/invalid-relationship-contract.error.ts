import { DatabaseError } from "./database.error";

/**
 * Thrown when a relationship method returns something other than
 * a relation descriptor.
 */
export class InvalidRelationshipContractError extends DatabaseError {
  public readonly relationName: string;

  public readonly modelName: string;

  public constructor(relationName: string, modelName: string) {
    super(
      `Relationship method "${modelName}.${relationName}()" must return a relation descriptor ` +
        `(an instance of Relation).`,
    );
    this.relationName = relationName;
    this.modelName = modelName;
  }
}
