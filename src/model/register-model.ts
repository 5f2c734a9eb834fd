import { ModelNotFoundError } from "../errors/model-not-found.error";
import type { ChildModel, Model } from "./model";

/**
 * Separator between a namespace and a model name, i.e `App\User`
 */
export const NAMESPACE_SEPARATOR = "\\";

/**
 * Options for the RegisterModel decorator
 */
export type RegisterModelOptions = {
  /**
   * Custom name for the model in the global registry.
   * If not provided, uses the class name.
   */
  name?: string;
  /**
   * Namespace the model is registered under.
   *
   * @example
   * ```typescript
   * @RegisterModel({ namespace: "App" })
   * export class Comment extends Model {}
   *
   * getModelFromRegistry("App\\Comment"); // Comment
   * ```
   */
  namespace?: string;
};

/**
 * Global model registry that maps model names to their constructors.
 * This allows for string-based model references to avoid circular dependencies.
 */
const modelsRegistry = new Map<string, ChildModel<Model>>();

/**
 * Prefix the given name with the namespace, adding the separator when it is missing.
 *
 * @example
 * ```typescript
 * qualifyModelName("Comment", "App"); // "App\\Comment"
 * qualifyModelName("Comment", "App\\"); // "App\\Comment"
 * qualifyModelName("Comment", ""); // "Comment"
 * ```
 */
export function qualifyModelName(name: string, namespace?: string): string {
  if (!namespace) return name;

  const prefix = namespace.endsWith(NAMESPACE_SEPARATOR)
    ? namespace
    : namespace + NAMESPACE_SEPARATOR;

  return prefix + name;
}

/**
 * Class decorator that registers a model in the global registry.
 *
 * @example
 * ```typescript
 * // Auto-capture class name
 * @RegisterModel()
 * export class User extends Model {
 *   static table = "users";
 * }
 *
 * // Namespaced
 * @RegisterModel({ namespace: "App" })
 * export class Comment extends Model {
 *   static table = "comments";
 * }
 *
 * // Later, retrieve by name:
 * const CommentModel = Model.getModel("App\\Comment");
 * ```
 */
export function RegisterModel(options?: RegisterModelOptions) {
  return function <T extends ChildModel<Model>>(target: T): T {
    const modelName = options?.name || target.name;

    if (!modelName) {
      throw new Error(
        "@RegisterModel decorator: Unable to determine model name. " +
          "Please provide a name in options or ensure your class has a name.",
      );
    }

    registerModelInRegistry(qualifyModelName(modelName, options?.namespace), target);

    return target;
  };
}

/**
 * Register a model under the given (possibly namespaced) name.
 * An existing registration with the same name is overwritten.
 */
export function registerModelInRegistry(name: string, model: ChildModel<Model>) {
  if (modelsRegistry.has(name)) {
    console.warn(
      `⚠️  Model "${name}" is already registered. ` +
        `This will overwrite the previous registration.`,
    );
  }

  modelsRegistry.set(name, model);
}

/**
 * Get a model class by its name from the global registry.
 *
 * @returns The model class or undefined if not found
 */
export function getModelFromRegistry(name: string) {
  return modelsRegistry.get(name);
}

/**
 * Get all registered models from the global registry.
 */
export function getAllModelsFromRegistry() {
  return new Map(modelsRegistry);
}

/**
 * Clean up all models from register
 */
export function cleanupModelsRegistery() {
  modelsRegistry.clear();
}

export function removeModelFromRegistery(name: string) {
  modelsRegistry.delete(name);
}

/**
 * Resolve a model class from either the class itself or its registered name.
 *
 * @throws ModelNotFoundError if the name is not registered
 */
export function resolveModelClass(model: ChildModel<Model> | string): ChildModel<Model> {
  if (typeof model !== "string") return model;

  const ModelClass = getModelFromRegistry(model);

  if (!ModelClass) {
    throw new ModelNotFoundError(model);
  }

  return ModelClass;
}
