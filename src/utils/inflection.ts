import { pascalCase, snakeCase } from "change-case";
import pluralize from "pluralize";

/**
 * Convert a relation name to the model name it points to by default.
 *
 * English inflection rules are used, irregular plurals may not singularize
 * as expected; declare the model explicitly in that case.
 *
 * @example
 * ```typescript
 * relationToModelName("comments"); // "Comment"
 * relationToModelName("user_languages"); // "UserLanguage"
 * ```
 */
export function relationToModelName(relationName: string): string {
  return pascalCase(pluralize.singular(relationName));
}

/**
 * Build the default foreign key of a model.
 *
 * @example
 * ```typescript
 * modelNameToForeignKey("User"); // "user_id"
 * modelNameToForeignKey("HTTPLog"); // "http_log_id"
 * ```
 */
export function modelNameToForeignKey(modelName: string): string {
  return `${snakeCase(modelName)}_id`;
}
