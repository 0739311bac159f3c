/**
 * View Transform
 *
 * 뷰 좌표 ↔ 이미지 좌표 변환
 *
 * 책임:
 * - 포인터 좌표 → 이미지 좌표 (히트 테스트, 드래그)
 * - 이미지 좌표 → 뷰 좌표 (오버레이 렌더링)
 * - 이미지 경계 클램핑
 * - 휠 줌, 팬 제스처 상태
 *
 * 렌더링 변환은 "zoom 배율 적용 후 pan/zoom 만큼 이동"이므로
 * 뷰 좌표 = 이미지 좌표 * zoom + pan, 역변환 = (뷰 좌표 - pan) / zoom
 */

import type { ImageSize, Point } from '../types';
import type { IViewTransform, ViewState, ViewTransformOptions } from './types';

const DEFAULT_ZOOM_STEP = 0.1;
const DEFAULT_MIN_ZOOM = 0.1;

/**
 * 이미지 경계로 클램핑
 *
 * 결과 범위: [0, width-1] x [0, height-1]
 */
export function clampToImage(point: Point, size: ImageSize): Point {
  return {
    x: Math.max(0, Math.min(point.x, size.width - 1)),
    y: Math.max(0, Math.min(point.y, size.height - 1)),
  };
}

/**
 * 정수 픽셀 좌표로 절삭 (드래그 좌표용)
 */
export function truncatePoint(point: Point): Point {
  return { x: Math.trunc(point.x), y: Math.trunc(point.y) };
}

/**
 * 뷰 변환기
 */
export class ViewTransform implements IViewTransform {
  private _zoom: number;
  private _pan: Point;
  private readonly zoomStep: number;
  private readonly minZoom: number;

  constructor(options: ViewTransformOptions = {}) {
    this._zoom = options.zoom ?? 1;
    this._pan = options.pan ? { ...options.pan } : { x: 0, y: 0 };
    this.zoomStep = options.zoomStep ?? DEFAULT_ZOOM_STEP;
    this.minZoom = options.minZoom ?? DEFAULT_MIN_ZOOM;

    if (!(this._zoom > 0)) {
      throw new RangeError(`zoom must be positive: ${this._zoom}`);
    }
  }

  get zoom(): number {
    return this._zoom;
  }

  get pan(): Point {
    return { ...this._pan };
  }

  /**
   * 표시용 배율 (%)
   */
  get zoomPercent(): number {
    return Math.trunc(this._zoom * 100);
  }

  // ---------------------------------------------------------------------------
  // 좌표 변환
  // ---------------------------------------------------------------------------

  toImageSpace(viewPoint: Point): Point {
    return {
      x: (viewPoint.x - this._pan.x) / this._zoom,
      y: (viewPoint.y - this._pan.y) / this._zoom,
    };
  }

  toViewSpace(imagePoint: Point): Point {
    return {
      x: imagePoint.x * this._zoom + this._pan.x,
      y: imagePoint.y * this._zoom + this._pan.y,
    };
  }

  // ---------------------------------------------------------------------------
  // 제스처
  // ---------------------------------------------------------------------------

  /**
   * 휠 한 칸 확대
   */
  zoomIn(): void {
    this._zoom += this.zoomStep;
  }

  /**
   * 휠 한 칸 축소 (minZoom 이하로 내려가지 않음)
   */
  zoomOut(): void {
    this._zoom = Math.max(this.minZoom, this._zoom - this.zoomStep);
  }

  /**
   * 팬 이동 (뷰 좌표 델타)
   */
  panBy(dx: number, dy: number): void {
    this._pan = {
      x: this._pan.x + Math.round(dx),
      y: this._pan.y + Math.round(dy),
    };
  }

  /**
   * 초기 상태로 (새 이미지 로드 시)
   */
  reset(): void {
    this._zoom = 1;
    this._pan = { x: 0, y: 0 };
  }

  getState(): ViewState {
    return { zoom: this._zoom, pan: this.pan };
  }
}
