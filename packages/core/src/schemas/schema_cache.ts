import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

/**
 * Shared AJV instance for every schema in core (matching rules, run
 * configuration, Slack and Confluence payloads).
 * Modules compile their validators once at load time through `compileSchema`.
 */
export class SchemaValidationCache {
  private static ajv: Ajv | null = null;

  /**
   * Gets the shared AJV instance, creating it on first use.
   */
  static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Drops the shared instance. Validators compiled earlier keep working.
   */
  static clearCache(): void {
    this.ajv = null;
  }
}

/**
 * Compiles a schema into a type guard for T.
 */
export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  return SchemaValidationCache.getAjv().compile<T>(schema);
}

/**
 * Formats AJV errors as "path message" lines.
 */
export function formatSchemaErrors(errors: ValidateFunction["errors"]): string[] {
  if (!errors) {
    return [];
  }
  return errors.map((error: ErrorObject) => {
    const missing = error.params["missingProperty"];
    const field = error.instancePath
      || (typeof missing === "string" ? `/${missing}` : "")
      || "/";
    return `${field} ${error.message ?? "is invalid"}`;
  });
}
