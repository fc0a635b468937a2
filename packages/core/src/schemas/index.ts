export { SchemaValidationCache, compileSchema, formatSchemaErrors } from './schema_cache';
