import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

/**
 * Singleton cache for schema validators to avoid repeated AJV compilation.
 *
 * AJV keeps compiled validators keyed by schema object, so asking twice for
 * the same schema returns the same function.
 */
export class SchemaValidationCache {
  private static ajv: Ajv | null = null;
  private static schemasLoaded = new Set<string>();

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object; its `$id` names it in cache stats
   */
  static getValidatorFromSchema<T = unknown>(schema: SchemaObject): ValidateFunction<T> {
    const validator = this.getAjv().compile<T>(schema);
    this.schemasLoaded.add(typeof schema.$id === "string" ? schema.$id : JSON.stringify(schema));
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemasLoaded.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.schemasLoaded.size,
      schemasLoaded: Array.from(this.schemasLoaded),
    };
  }
}
