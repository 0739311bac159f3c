/**
 * Skeleton helpers
 *
 * 스켈레톤 생성, 복사, 키포인트 조회
 */

import type { Point } from '../types';
import { getTopology } from './topology';
import type {
  KeypointSlot,
  PartName,
  PresentKeypoint,
  Skeleton,
  SkeletonVariant,
} from './types';

/**
 * 기본 위치로 스켈레톤 생성
 *
 * 모든 파트가 앵커 + 변형별 오프셋 위치에 놓임
 */
export function createSkeleton(id: number, variant: SkeletonVariant, anchor: Point): Skeleton {
  const { parts, defaultOffsets } = getTopology(variant);
  const keypoints: Record<PartName, KeypointSlot> = {};

  for (const part of parts) {
    const offset = defaultOffsets[part];
    keypoints[part] = { x: anchor.x + offset.x, y: anchor.y + offset.y };
  }

  return { id, variant, keypoints };
}

/**
 * 주어진 키포인트 값으로 스켈레톤 생성 (디코딩용)
 *
 * 목록에 없는 파트는 미설정(undefined)으로 둠
 */
export function createSkeletonFrom(
  id: number,
  variant: SkeletonVariant,
  values: Partial<Record<PartName, KeypointSlot>>
): Skeleton {
  const keypoints: Record<PartName, KeypointSlot> = {};

  for (const part of getTopology(variant).parts) {
    keypoints[part] = copySlot(values[part]);
  }

  return { id, variant, keypoints };
}

/**
 * 스켈레톤 깊은 복사
 */
export function cloneSkeleton(skeleton: Skeleton): Skeleton {
  const keypoints: Record<PartName, KeypointSlot> = {};

  for (const [part, slot] of Object.entries(skeleton.keypoints)) {
    keypoints[part] = copySlot(slot);
  }

  return { id: skeleton.id, variant: skeleton.variant, keypoints };
}

/**
 * 불변 스냅샷 (히스토리/렌더링용)
 */
export function freezeSkeleton(skeleton: Skeleton): Readonly<Skeleton> {
  const copy = cloneSkeleton(skeleton);
  for (const slot of Object.values(copy.keypoints)) {
    if (slot) {
      Object.freeze(slot);
    }
  }
  Object.freeze(copy.keypoints);
  return Object.freeze(copy);
}

/**
 * 존재하는 키포인트 목록 (파트 순서)
 */
export function getPresentKeypoints(skeleton: Skeleton): PresentKeypoint[] {
  const present: PresentKeypoint[] = [];

  for (const part of getTopology(skeleton.variant).parts) {
    const slot = skeleton.keypoints[part];
    if (slot) {
      present.push({ part, position: slot });
    }
  }

  return present;
}

/**
 * 사용 중이지 않은 가장 작은 양의 정수 ID
 */
export function nextSkeletonId(usedIds: Iterable<number>): number {
  const used = new Set(usedIds);
  let id = 1;
  while (used.has(id)) {
    id++;
  }
  return id;
}

export function copySlot(slot: KeypointSlot): KeypointSlot {
  return slot ? { x: slot.x, y: slot.y } : slot;
}
