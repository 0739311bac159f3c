/**
 * Session Type Definitions
 *
 * UI 레이어(캔버스, 파일 선택기, 토스트)와 세션 사이의 계약
 */

import type { Point } from '../types';
import type { AnnotationErrorType } from '../errors';
import type { PersistenceIO } from '../persistence';
import type { PoseDecodeOptions } from '../format';
import type { PartName, Skeleton } from '../skeleton';

// =============================================================================
// Image
// =============================================================================

/**
 * 로드된 이미지 정보
 *
 * 픽셀 데이터는 UI 레이어가 보유. 세션은 이름과 크기만 사용
 */
export interface ImageInfo {
  /** 파일 이름 또는 경로 (라벨 파일 이름의 기준) */
  name: string;
  width: number;
  height: number;
}

/**
 * 이미지 목록 제공자 (폴더 탐색 결과 등)
 */
export interface ImageProvider {
  /** 이미지 수 */
  readonly count: number;
  /** 인덱스의 이미지 정보 */
  getImage(index: number): ImageInfo | Promise<ImageInfo>;
}

// =============================================================================
// Actions
// =============================================================================

/**
 * 키보드 단축키로 실행되는 동작
 */
export type KeyAction =
  | 'addLmg'
  | 'addRifle'
  | 'undo'
  | 'redo'
  | 'reset'
  | 'deleteKeypoint'
  | 'save'
  | 'nextImage'
  | 'previousImage'
  | 'toggleAutoSave';

/**
 * 키 입력 (KeyboardEvent 호환)
 */
export interface KeyInput {
  key: string;
  ctrlKey?: boolean;
  shiftKey?: boolean;
  altKey?: boolean;
  metaKey?: boolean;
}

/**
 * 포인터 수정자 (PointerEvent 호환)
 */
export interface PointerModifiers {
  /** Ctrl 누른 상태의 드래그는 팬 */
  ctrlKey?: boolean;
}

// =============================================================================
// Notices
// =============================================================================

/**
 * 알림 종류
 *
 * AnnotationErrorType 외에 세션 자체의 상태 알림 포함
 */
export type SessionNoticeType =
  | AnnotationErrorType
  | 'NO_IMAGE' // 이미지가 로드되지 않은 상태의 명령
  | 'NO_IMAGES' // 이미지 목록이 비어 있음
  | 'NO_SAVE_DIRECTORY' // 저장 폴더 미설정
  | 'SAVED' // 라벨 파일 기록
  | 'SKELETON_ADDED'
  | 'AUTO_SAVE_CHANGED';

export type SessionNoticeLevel = 'info' | 'warning' | 'error';

/**
 * 사용자 알림 (UI 레이어가 토스트 등으로 표시)
 */
export interface SessionNotice {
  type: SessionNoticeType;
  level: SessionNoticeLevel;
  message: string;
}

// =============================================================================
// State
// =============================================================================

/**
 * 렌더링용 세션 상태
 */
export interface SessionState {
  /** 현재 이미지 (없으면 null) */
  image: ImageInfo | null;
  /** 이미지 목록 내 인덱스 (목록 없이 로드했으면 null) */
  imageIndex: number | null;
  /** 이미지 목록 크기 */
  imageCount: number;
  /** 스켈레톤 스냅샷 */
  skeletons: ReadonlyArray<Readonly<Skeleton>>;
  selectedSkeletonId: number | null;
  selectedPart: PartName | null;
  zoom: number;
  /** 표시용 배율 (%) */
  zoomPercent: number;
  pan: Point;
  autoSave: boolean;
  saveDirectory: string | null;
  canUndo: boolean;
  canRedo: boolean;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * 세션 설정 값
 */
export interface SessionConfig {
  /** 라벨 파일 폴더 (null: 저장/로드 안 함) */
  saveDirectory: string | null;
  /** 이미지 이동/초기화 시 자동 저장 */
  autoSave: boolean;
  /** 히트 테스트 허용 오차 (이미지 픽셀) */
  hitTolerance: number;
  /** 휠 한 칸당 배율 변화량 */
  zoomStep: number;
  /** 최소 배율 */
  minZoom: number;
  /** 최대 Undo 기록 수 */
  maxHistorySize: number;
  /** 라벨 라인의 모자란 키포인트 처리 */
  missingKeypoints: NonNullable<PoseDecodeOptions['missingKeypoints']>;
}

/**
 * AnnotationSession 옵션
 */
export interface AnnotationSessionOptions extends Partial<SessionConfig> {
  /** 파일 입출력 (기본: node:fs 기반) */
  persistence?: PersistenceIO;
  /** 상태 변경 콜백 */
  onChange?: (state: SessionState) => void;
  /** 알림 콜백 */
  onNotice?: (notice: SessionNotice) => void;
}

export const DEFAULT_SESSION_CONFIG: Required<SessionConfig> = {
  saveDirectory: null,
  autoSave: false,
  hitTolerance: 10,
  zoomStep: 0.1,
  minZoom: 0.1,
  maxHistorySize: Infinity,
  missingKeypoints: 'unset',
};
