export { AnnotationError, isAnnotationError } from './AnnotationError';
export type { AnnotationErrorType } from './AnnotationError';
