/**
 * Session Module
 *
 * 저장소, 히스토리, 뷰 변환, 히트 테스트, 라벨 파일을 하나의 편집 세션으로 묶음
 *
 * @packageDocumentation
 */

export * from './types';
export { AnnotationSession } from './AnnotationSession';
export {
  resolveKeyAction,
  getModifiers,
  KeyboardModifiers,
  DEFAULT_KEY_BINDINGS,
} from './keyBindings';
export type { KeyBinding } from './keyBindings';
