/**
 * React Hooks for Keymark
 */

export { useAnnotationSession } from './useAnnotationSession';
export type {
  UseAnnotationSessionOptions,
  UseAnnotationSessionReturn,
  AnnotationSessionHandlers,
} from './useAnnotationSession';
