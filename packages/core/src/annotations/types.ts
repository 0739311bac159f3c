/**
 * Annotation System Type Definitions
 *
 * 편집 기록 (Undo/Redo 단위)
 */

import type { Point } from '../types';
import type { KeypointSlot, PartName, Skeleton } from '../skeleton';

// =============================================================================
// Edit Records
// =============================================================================

/**
 * 스켈레톤 추가
 *
 * Redo 시 같은 ID로 복원하기 위해 생성 시점 스냅샷을 보관
 */
export interface AddSkeletonEdit {
  kind: 'addSkeleton';
  skeleton: Readonly<Skeleton>;
}

/**
 * 키포인트 이동 (드래그의 각 move 이벤트마다 하나)
 */
export interface MoveKeypointEdit {
  kind: 'moveKeypoint';
  skeletonId: number;
  part: PartName;
  /** 이동 직전 값 (미설정 슬롯일 수 있음) */
  oldPosition: KeypointSlot;
  newPosition: Point;
}

/**
 * 키포인트 삭제 (없음으로 설정)
 */
export interface DeleteKeypointEdit {
  kind: 'deleteKeypoint';
  skeletonId: number;
  part: PartName;
  oldPosition: KeypointSlot;
}

/**
 * 전체 초기화
 */
export interface ResetAllEdit {
  kind: 'resetAll';
  /** 초기화 직전 스켈레톤 목록 */
  previous: ReadonlyArray<Readonly<Skeleton>>;
}

/**
 * 편집 기록 (태그 유니온)
 */
export type EditRecord = AddSkeletonEdit | MoveKeypointEdit | DeleteKeypointEdit | ResetAllEdit;

export type EditKind = EditRecord['kind'];

// =============================================================================
// Store Results
// =============================================================================

/**
 * moveKeypoint 결과
 */
export interface KeypointMoveResult {
  /** 이동 직전 값 */
  oldPosition: KeypointSlot;
  /** 클램핑 후 저장된 값 */
  newPosition: Point;
}

/**
 * 히스토리 상태 정보
 */
export interface HistoryState {
  undoCount: number;
  redoCount: number;
  canUndo: boolean;
  canRedo: boolean;
}
