/**
 * Annotations Module
 *
 * 스켈레톤 저장소와 편집 히스토리
 *
 * 흐름:
 * - 포인터/키 이벤트 → (히트 테스트) → AnnotationStore 편집
 * - 편집 결과 → EditRecord → EditHistory.record()
 *
 * @packageDocumentation
 */

export * from './types';

export { AnnotationStore } from './AnnotationStore';
export type { AnnotationStoreOptions } from './AnnotationStore';

export { EditHistory } from './EditHistory';
export type { EditHistoryOptions } from './EditHistory';
