/**
 * Annotation Store
 *
 * 현재 이미지의 스켈레톤 저장소
 *
 * 책임:
 * - 스켈레톤 추가/제거, 키포인트 이동/삭제
 * - ID 할당 및 재사용
 * - 이미지 경계 클램핑
 * - 히스토리용 불변 스냅샷
 *
 * 모든 편집은 이 클래스를 거침. 히스토리 기록은 호출자 책임
 */

import type { ImageSize, Point } from '../types';
import { clampToImage } from '../coordinates';
import { AnnotationError } from '../errors';
import {
  cloneSkeleton,
  copySlot,
  createSkeleton,
  createSkeletonFrom,
  freezeSkeleton,
  getTopology,
  isPartOf,
  nextSkeletonId,
  type KeypointSlot,
  type PartName,
  type Skeleton,
  type SkeletonVariant,
} from '../skeleton';
import type { KeypointMoveResult } from './types';

// =============================================================================
// Annotation Store Options
// =============================================================================

/**
 * AnnotationStore 옵션
 */
export interface AnnotationStoreOptions {
  /** 로드된 이미지 크기 (클램핑 기준) */
  imageSize: ImageSize;
  /** 변경 콜백 */
  onChange?: (skeletons: ReadonlyArray<Readonly<Skeleton>>) => void;
}

// =============================================================================
// Annotation Store
// =============================================================================

export class AnnotationStore {
  /** 살아있는 스켈레톤 (삽입 순서 = 렌더링/저장 순서) */
  private skeletons: Skeleton[] = [];

  /** 제거되어 재사용 가능한 ID */
  private retiredIds: Set<number> = new Set();

  /** 이미지 크기 */
  private readonly imageSize: ImageSize;

  /** 변경 콜백 */
  private onChange?: (skeletons: ReadonlyArray<Readonly<Skeleton>>) => void;

  constructor(options: AnnotationStoreOptions) {
    const { width, height } = options.imageSize;
    if (!(width > 0) || !(height > 0)) {
      throw new RangeError(`Invalid image size: ${width}x${height}`);
    }
    this.imageSize = { width, height };
    this.onChange = options.onChange;
  }

  // ---------------------------------------------------------------------------
  // Read
  // ---------------------------------------------------------------------------

  get count(): number {
    return this.skeletons.length;
  }

  getImageSize(): ImageSize {
    return { ...this.imageSize };
  }

  has(id: number): boolean {
    return this.skeletons.some((s) => s.id === id);
  }

  /**
   * 스켈레톤 조회 (스냅샷)
   */
  get(id: number): Readonly<Skeleton> | undefined {
    const skeleton = this.find(id);
    return skeleton ? freezeSkeleton(skeleton) : undefined;
  }

  /**
   * 전체 스켈레톤 불변 스냅샷
   *
   * 히스토리 기록은 반드시 스냅샷을 보관해야 함
   * (키포인트는 제자리에서 수정되므로 참조를 보관하면 Undo 상태가 오염됨)
   */
  snapshot(): ReadonlyArray<Readonly<Skeleton>> {
    return Object.freeze(this.skeletons.map(freezeSkeleton));
  }

  getRetiredIds(): number[] {
    return Array.from(this.retiredIds).sort((a, b) => a - b);
  }

  /**
   * 다음에 할당될 ID
   *
   * 살아있는 스켈레톤이 쓰지 않는 가장 작은 양의 정수
   */
  allocateId(): number {
    return nextSkeletonId(this.skeletons.map((s) => s.id));
  }

  // ---------------------------------------------------------------------------
  // Create
  // ---------------------------------------------------------------------------

  /**
   * 기본 위치로 스켈레톤 추가
   *
   * @param variant - 변형
   * @param anchor - 기본 오프셋의 기준점 (이미지 좌표)
   * @returns 추가된 스켈레톤 스냅샷
   */
  addSkeleton(variant: SkeletonVariant, anchor: Point): Readonly<Skeleton> {
    const skeleton = createSkeleton(this.allocateId(), variant, anchor);
    this.insert(skeleton);
    return freezeSkeleton(skeleton);
  }

  /**
   * 디코딩된 키포인트 값으로 스켈레톤 추가
   */
  addWithKeypoints(
    variant: SkeletonVariant,
    keypoints: Partial<Record<PartName, KeypointSlot>>
  ): Readonly<Skeleton> {
    const skeleton = createSkeletonFrom(this.allocateId(), variant, keypoints);
    this.insert(skeleton);
    return freezeSkeleton(skeleton);
  }

  /**
   * 스냅샷을 같은 ID로 복원 (addSkeleton Redo용)
   */
  restoreSkeleton(snapshot: Readonly<Skeleton>): void {
    if (this.has(snapshot.id)) {
      throw new Error(`[AnnotationStore] Skeleton id already in use: ${snapshot.id}`);
    }
    this.insert(cloneSkeleton(snapshot));
  }

  // ---------------------------------------------------------------------------
  // Update
  // ---------------------------------------------------------------------------

  /**
   * 키포인트 이동
   *
   * 위치는 [0, width-1] x [0, height-1]로 클램핑됨
   */
  moveKeypoint(id: number, part: PartName, position: Point): KeypointMoveResult {
    const skeleton = this.require(id, part);
    const oldPosition = copySlot(skeleton.keypoints[part]);
    const newPosition = clampToImage(position, this.imageSize);

    skeleton.keypoints[part] = newPosition;
    this.notifyChange();

    return { oldPosition, newPosition: { ...newPosition } };
  }

  /**
   * 키포인트 삭제 (없음으로 설정)
   *
   * @returns 삭제 직전 값
   */
  deleteKeypoint(id: number, part: PartName): KeypointSlot {
    const skeleton = this.require(id, part);
    const oldPosition = copySlot(skeleton.keypoints[part]);

    skeleton.keypoints[part] = null;
    this.notifyChange();

    return oldPosition;
  }

  /**
   * 키포인트 값을 그대로 기록 (Undo/Redo용, 클램핑 없음)
   */
  setKeypoint(id: number, part: PartName, slot: KeypointSlot): void {
    const skeleton = this.require(id, part);
    skeleton.keypoints[part] = copySlot(slot);
    this.notifyChange();
  }

  // ---------------------------------------------------------------------------
  // Delete
  // ---------------------------------------------------------------------------

  /**
   * 스켈레톤 제거 (ID는 재사용 가능 목록으로)
   *
   * @returns 제거된 스켈레톤 스냅샷
   */
  removeSkeleton(id: number): Readonly<Skeleton> {
    const index = this.skeletons.findIndex((s) => s.id === id);
    if (index < 0) {
      console.warn(`[AnnotationStore] Skeleton not found: ${id}`);
      throw AnnotationError.notFound(id);
    }

    const [removed] = this.skeletons.splice(index, 1);
    this.retiredIds.add(id);
    this.notifyChange();

    return freezeSkeleton(removed);
  }

  /**
   * 전체 초기화
   */
  resetAll(): void {
    this.skeletons = [];
    this.retiredIds.clear();
    this.notifyChange();
  }

  /**
   * 스켈레톤 목록 교체 (resetAll Undo, 라벨 파일 로드용)
   */
  replaceAll(snapshot: ReadonlyArray<Readonly<Skeleton>>): void {
    this.skeletons = snapshot.map(cloneSkeleton);
    this.retiredIds.clear();
    this.notifyChange();
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private insert(skeleton: Skeleton): void {
    this.skeletons.push(skeleton);
    this.retiredIds.delete(skeleton.id);
    this.notifyChange();
  }

  private find(id: number): Skeleton | undefined {
    return this.skeletons.find((s) => s.id === id);
  }

  /**
   * 스켈레톤 조회 + 파트 검증
   */
  private require(id: number, part: PartName): Skeleton {
    const skeleton = this.find(id);
    if (!skeleton) {
      console.warn(`[AnnotationStore] Skeleton not found: ${id}`);
      throw AnnotationError.notFound(id);
    }

    if (!isPartOf(skeleton.variant, part)) {
      console.error(
        `[AnnotationStore] Invalid part "${part}" for ${getTopology(skeleton.variant).label}`
      );
      throw AnnotationError.invalidPart(part, skeleton.variant);
    }

    return skeleton;
  }

  private notifyChange(): void {
    if (this.onChange) {
      this.onChange(this.snapshot());
    }
  }
}
