/**
 * Coordinate System
 *
 * 변환 흐름:
 * Pointer Event → 뷰 좌표 → 이미지 좌표 (히트 테스트, 저장)
 * 이미지 좌표 (로드) → 뷰 좌표 (렌더링)
 */

export * from './types';
export { ViewTransform, clampToImage, truncatePoint } from './ViewTransform';
