import { DatabaseError } from "./database.error";

/**
 * Thrown when a model identifier can not be resolved from the models registry.
 */
export class ModelNotFoundError extends DatabaseError {
  public readonly modelName: string;

  public constructor(modelName: string) {
    super(
      `Model "${modelName}" not found in registry. ` +
        `Make sure it is decorated with @RegisterModel() and imported.`,
    );
    this.modelName = modelName;
  }
}
