/**
 * Shared Type Definitions
 */

/**
 * 2D 좌표점
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * 이미지 크기 (픽셀)
 */
export interface ImageSize {
  width: number;
  height: number;
}
