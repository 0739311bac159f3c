export type { PersistenceIO, SaveOutcome } from './types';
export { createNodePersistence } from './NodePersistence';
export { AnnotationFileStore, labelFileNameFor, LABEL_FILE_EXTENSION } from './AnnotationFileStore';
