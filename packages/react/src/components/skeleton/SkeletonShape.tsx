/**
 * SkeletonShape - Single Skeleton SVG Shape
 *
 * 스켈레톤 하나를 표시하는 도형
 *
 * 렌더링:
 * - 연결선 (양 끝 키포인트가 모두 있을 때만)
 * - 키포인트 마커
 * - "S{id}:{part}" 라벨
 * - 선택된 키포인트 강조
 */

import { getPresentKeypoints, getTopology, type PartName, type Point, type Skeleton } from '@keymark/core';
import type { OverlayConfig } from '../../types';

/**
 * SkeletonShape Props
 */
export interface SkeletonShapeProps {
  skeleton: Readonly<Skeleton>;
  /** 이미지 좌표 → 뷰 좌표 */
  toViewSpace: (imagePoint: Point) => Point;
  /** 선택된 파트 (이 스켈레톤이 선택된 경우만) */
  selectedPart?: PartName | null;
  config: OverlayConfig;
}

/**
 * SkeletonShape
 */
export function SkeletonShape({ skeleton, toViewSpace, selectedPart = null, config }: SkeletonShapeProps) {
  const { connections } = getTopology(skeleton.variant);
  const keypoints = getPresentKeypoints(skeleton).map(({ part, position }) => ({
    part,
    point: toViewSpace(position),
  }));

  const viewPointOf = (part: PartName): Point | undefined =>
    keypoints.find((k) => k.part === part)?.point;

  return (
    <g className="skeleton-shape" data-skeleton-id={skeleton.id}>
      {/* 연결선 */}
      {connections.map(([from, to]) => {
        const p1 = viewPointOf(from);
        const p2 = viewPointOf(to);
        if (!p1 || !p2) return null;

        return (
          <line
            key={`${from}-${to}`}
            x1={p1.x}
            y1={p1.y}
            x2={p2.x}
            y2={p2.y}
            stroke={config.connectionColor}
            strokeWidth={config.connectionWidth}
            strokeLinecap="round"
          />
        );
      })}

      {/* 키포인트 + 라벨 */}
      {keypoints.map(({ part, point }) => {
        const isSelected = part === selectedPart;

        return (
          <g key={part} className="skeleton-keypoint" data-part={part}>
            <circle
              cx={point.x}
              cy={point.y}
              r={isSelected ? config.keypointRadius * 1.4 : config.keypointRadius}
              fill={isSelected ? config.selectedKeypointColor : config.keypointColor}
            />
            {config.showLabels && (
              <text
                x={point.x + config.labelOffset.x}
                y={point.y + config.labelOffset.y}
                fill={config.labelColor}
                fontSize={config.labelFontSize}
                fontWeight={isSelected ? 'bold' : 'normal'}
                textAnchor="start"
                style={{ pointerEvents: 'none', fontFamily: 'monospace' }}
              >
                {`S${skeleton.id}:${part}`}
              </text>
            )}
          </g>
        );
      })}
    </g>
  );
}
