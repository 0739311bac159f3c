/**
 * Skeleton Type Definitions
 */

import type { Point } from '../types';

// =============================================================================
// Variant
// =============================================================================

/**
 * 스켈레톤 변형
 *
 * 변형별 파트 목록/연결/클래스 인덱스는 SKELETON_TOPOLOGIES 테이블에서 조회
 */
export enum SkeletonVariant {
  Lmg = 'Lmg',
  Rifle = 'Rifle',
}

/**
 * 파트 이름 (예: "butt", "pistol grip")
 */
export type PartName = string;

/**
 * 파트 간 연결 (렌더링용 선분)
 */
export type PartConnection = readonly [PartName, PartName];

/**
 * 변형별 토폴로지 정의
 */
export interface SkeletonTopology {
  /** 변형 */
  variant: SkeletonVariant;
  /** 표시 이름 */
  label: string;
  /** 라벨 파일 클래스 인덱스 */
  classIndex: number;
  /** 파트 목록 (라벨 파일의 키포인트 순서) */
  parts: readonly PartName[];
  /** 파트 연결 (무방향) */
  connections: readonly PartConnection[];
  /** 앵커 기준 기본 위치 오프셋 */
  defaultOffsets: Readonly<Record<PartName, Point>>;
}

// =============================================================================
// Keypoint
// =============================================================================

/**
 * 키포인트 위치
 *
 * - Point: 이미지 픽셀 좌표
 * - null: 없음 (삭제되었거나 라벨 파일에 -1 -1로 기록됨)
 */
export type KeypointPosition = Point | null;

/**
 * 키포인트 슬롯
 *
 * undefined는 "미설정" - 라벨 파일 라인의 뒤쪽 필드가 모자랄 때만 발생
 * 렌더링/히트 테스트/인코딩에서는 null과 동일하게 취급
 */
export type KeypointSlot = KeypointPosition | undefined;

// =============================================================================
// Skeleton
// =============================================================================

/**
 * 스켈레톤 인스턴스
 *
 * keypoints의 키는 변형의 파트 목록과 정확히 일치
 */
export interface Skeleton {
  /** 양의 정수 ID (살아있는 스켈레톤 간 고유) */
  id: number;
  /** 변형 */
  variant: SkeletonVariant;
  /** 파트 → 키포인트 */
  keypoints: Record<PartName, KeypointSlot>;
}

/**
 * 존재하는 키포인트 (히트 테스트/인코딩용)
 */
export interface PresentKeypoint {
  part: PartName;
  position: Point;
}
