/**
 * @keymark/react 공통 타입 정의
 */

import type { Point } from '@keymark/core';

/**
 * 스켈레톤 오버레이 렌더링 설정
 */
export interface OverlayConfig {
  /** 키포인트 색상 */
  keypointColor: string;
  /** 선택된 키포인트 색상 */
  selectedKeypointColor: string;
  /** 키포인트 반지름 (뷰 픽셀) */
  keypointRadius: number;
  /** 연결선 색상 */
  connectionColor: string;
  /** 연결선 두께 */
  connectionWidth: number;
  /** 라벨 색상 */
  labelColor: string;
  /** 라벨 폰트 크기 */
  labelFontSize: number;
  /** 키포인트 기준 라벨 위치 */
  labelOffset: Point;
  /** 라벨 표시 여부 */
  showLabels: boolean;
}

export const DEFAULT_OVERLAY_CONFIG: Required<OverlayConfig> = {
  keypointColor: '#ff0000',
  selectedKeypointColor: '#ffff00',
  keypointRadius: 5,
  connectionColor: '#00ff00',
  connectionWidth: 2,
  labelColor: '#ffffff',
  labelFontSize: 12,
  labelOffset: { x: 10, y: -10 },
  showLabels: true,
};
