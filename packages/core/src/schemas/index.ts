export { SchemaValidationCache } from "./schema_cache";
export { ConfigDocumentSchema, StateDocumentSchema, TaskConfigRecordSchema } from "./document_schemas";
