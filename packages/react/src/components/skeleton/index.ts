/**
 * Skeleton Components
 *
 * 구조:
 * - SkeletonOverlay: 메인 오버레이 컴포넌트
 * - SkeletonShape: 스켈레톤 하나의 도형
 * - SkeletonLegend: 변형별 파트 목록
 */

export { SkeletonOverlay } from './SkeletonOverlay';
export type { SkeletonOverlayProps } from './SkeletonOverlay';

export { SkeletonShape } from './SkeletonShape';
export type { SkeletonShapeProps } from './SkeletonShape';

export { SkeletonLegend } from './SkeletonLegend';
export type { SkeletonLegendProps } from './SkeletonLegend';
