/**
 * SkeletonOverlay - Skeleton SVG Overlay Component
 *
 * 스켈레톤을 SVG로 렌더링하는 오버레이 컴포넌트
 *
 * 책임:
 * - 이미지 좌표 → 뷰 좌표 변환
 * - 스켈레톤별 도형 렌더링
 * - 선택된 키포인트 강조
 *
 * 렌더링 전용. 포인터 입력은 컨테이너에서 세션으로 전달
 *
 * @example
 * ```tsx
 * const { state, transform, handlers } = useAnnotationSession({ saveDirectory });
 *
 * <div {...handlers} style={{ position: 'relative' }}>
 *   <img src={imageUrl} style={{ transform: `translate(...) scale(${state.zoom})` }} />
 *   <SkeletonOverlay
 *     skeletons={state.skeletons}
 *     transform={transform}
 *     selectedSkeletonId={state.selectedSkeletonId}
 *     selectedPart={state.selectedPart}
 *   />
 * </div>
 * ```
 */

import { useCallback, useMemo, type CSSProperties } from 'react';
import type { IViewTransform, PartName, Point, Skeleton } from '@keymark/core';
import { DEFAULT_OVERLAY_CONFIG, type OverlayConfig } from '../../types';
import { SkeletonShape } from './SkeletonShape';

// =============================================================================
// Types
// =============================================================================

/**
 * SkeletonOverlay Props
 */
export interface SkeletonOverlayProps {
  /** 스켈레톤 스냅샷 */
  skeletons: ReadonlyArray<Readonly<Skeleton>>;
  /** 좌표 변환 */
  transform: IViewTransform;
  selectedSkeletonId?: number | null;
  selectedPart?: PartName | null;
  /** 렌더링 설정 */
  config?: Partial<OverlayConfig>;
  /** 커스텀 스타일 */
  style?: CSSProperties;
  /** 커스텀 클래스명 */
  className?: string;
}

// =============================================================================
// SkeletonOverlay Component
// =============================================================================

export function SkeletonOverlay({
  skeletons,
  transform,
  selectedSkeletonId = null,
  selectedPart = null,
  config: customConfig,
  style,
  className,
}: SkeletonOverlayProps) {
  const config = useMemo(
    () => ({ ...DEFAULT_OVERLAY_CONFIG, ...customConfig }),
    [customConfig]
  );

  const toViewSpace = useCallback(
    (imagePoint: Point) => transform.toViewSpace(imagePoint),
    [transform]
  );

  return (
    <svg
      className={className}
      style={{
        position: 'absolute',
        top: 0,
        left: 0,
        width: '100%',
        height: '100%',
        pointerEvents: 'none',
        overflow: 'visible',
        ...style,
      }}
    >
      <g className="skeleton-shapes">
        {skeletons.map((skeleton) => (
          <SkeletonShape
            key={skeleton.id}
            skeleton={skeleton}
            toViewSpace={toViewSpace}
            selectedPart={skeleton.id === selectedSkeletonId ? selectedPart : null}
            config={config}
          />
        ))}
      </g>
    </svg>
  );
}
