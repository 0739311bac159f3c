/**
 * @keymark/react
 *
 * React building blocks for skeleton keypoint annotation
 *
 * 구성:
 * - SkeletonOverlay: 스켈레톤 SVG 오버레이 (연결선, 키포인트, 라벨)
 * - SkeletonLegend: 변형별 파트 목록
 * - useAnnotationSession: 세션 생성 + 상태 미러링 + 이벤트 핸들러
 */

export const VERSION = '0.0.1';

// Types
export { DEFAULT_OVERLAY_CONFIG } from './types';
export type { OverlayConfig } from './types';

// Components
export {
  SkeletonOverlay,
  SkeletonShape,
  SkeletonLegend,
  type SkeletonOverlayProps,
  type SkeletonShapeProps,
  type SkeletonLegendProps,
} from './components/skeleton';

// Hooks
export {
  useAnnotationSession,
  type UseAnnotationSessionOptions,
  type UseAnnotationSessionReturn,
  type AnnotationSessionHandlers,
} from './hooks';

// Utils
export { cn } from './utils';
