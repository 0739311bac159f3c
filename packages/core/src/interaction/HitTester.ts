/**
 * Hit Tester
 *
 * 뷰 좌표의 포인터 위치로 키포인트 찾기
 *
 * 정책: "허용 오차 내 첫 번째" (전역 최근접 아님)
 * - 스켈레톤 순서 → 파트 순서로 순회
 * - 거리는 이미지 좌표에서 계산
 * - 두 키포인트가 겹치면 먼저 만나는 쪽이 선택됨
 */

import type { Point } from '../types';
import type { IViewTransform } from '../coordinates';
import { getPresentKeypoints, type PartName, type Skeleton } from '../skeleton';

/**
 * 기본 허용 오차 (이미지 픽셀)
 */
export const DEFAULT_HIT_TOLERANCE = 10;

/**
 * 히트 테스트 결과
 */
export interface KeypointHit {
  /** 스켈레톤 ID */
  skeletonId: number;
  /** 파트 이름 */
  part: PartName;
  /** 이미지 좌표 거리 */
  distance: number;
}

export class HitTester {
  constructor(private readonly transform: IViewTransform) {}

  /**
   * 키포인트 히트 테스트
   *
   * @param viewPoint - 포인터 위치 (뷰 좌표)
   * @param skeletons - 살아있는 스켈레톤 (렌더링 순서)
   * @param tolerance - 허용 오차 (이미지 픽셀)
   * @returns 첫 번째 히트 또는 null
   */
  find(
    viewPoint: Point,
    skeletons: readonly Skeleton[],
    tolerance: number = DEFAULT_HIT_TOLERANCE
  ): KeypointHit | null {
    const imagePoint = this.transform.toImageSpace(viewPoint);

    for (const skeleton of skeletons) {
      for (const { part, position } of getPresentKeypoints(skeleton)) {
        const distance = Math.hypot(imagePoint.x - position.x, imagePoint.y - position.y);
        if (distance <= tolerance) {
          return { skeletonId: skeleton.id, part, distance };
        }
      }
    }

    return null;
  }
}
