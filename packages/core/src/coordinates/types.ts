/**
 * Coordinate System Type Definitions
 *
 * 좌표 체계:
 * 1. 이미지 좌표 (저장용) - 원본 이미지 픽셀 기준, zoom/pan 영향 없음
 * 2. 뷰 좌표 (이벤트/렌더링용) - 화면 포인터 기준, zoom/pan 영향 받음
 */

import type { Point } from '../types';

/**
 * 뷰 변환 상태
 */
export interface ViewState {
  /** 확대/축소 배율 (양수, 기본 1.0) */
  zoom: number;
  /** 이동 오프셋 (뷰 좌표, 정수) */
  pan: Point;
}

/**
 * ViewTransform 옵션
 */
export interface ViewTransformOptions {
  /** 초기 배율 (기본: 1.0) */
  zoom?: number;
  /** 초기 오프셋 (기본: 0, 0) */
  pan?: Point;
  /** 휠 한 칸당 배율 변화량 (기본: 0.1) */
  zoomStep?: number;
  /** 최소 배율 (기본: 0.1) */
  minZoom?: number;
}

/**
 * 좌표 변환기 인터페이스
 */
export interface IViewTransform {
  /**
   * 뷰 좌표 → 이미지 좌표
   */
  toImageSpace(viewPoint: Point): Point;

  /**
   * 이미지 좌표 → 뷰 좌표
   */
  toViewSpace(imagePoint: Point): Point;
}
