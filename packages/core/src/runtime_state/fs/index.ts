export { resolveDocumentPaths, createRuntimeState } from './fs_runtime_state';
export type { DocumentPaths, DocumentPathOverrides } from './fs_runtime_state';
