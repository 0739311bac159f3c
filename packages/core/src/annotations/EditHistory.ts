/**
 * Edit History
 *
 * Undo/Redo 관리
 *
 * 책임:
 * - 편집 기록
 * - Undo/Redo 실행
 * - 히스토리 스택 관리
 *
 * 기록별 역실행/재실행:
 * - addSkeleton: 제거 / 같은 ID로 복원
 * - moveKeypoint: 이전 위치 / 새 위치
 * - deleteKeypoint: 이전 위치 / 없음
 * - resetAll: 이전 스냅샷 / 전체 초기화
 */

import { AnnotationError } from '../errors';
import type { AnnotationStore } from './AnnotationStore';
import type { EditRecord, HistoryState } from './types';

// =============================================================================
// Types
// =============================================================================

/**
 * EditHistory 옵션
 */
export interface EditHistoryOptions {
  /** 최대 Undo 기록 수 (기본: 무제한) */
  maxSize?: number;
  /** 변경 콜백 */
  onChange?: (canUndo: boolean, canRedo: boolean) => void;
}

// =============================================================================
// Edit History
// =============================================================================

export class EditHistory {
  /** Undo 스택 (끝에서 push/pop) */
  private undoLog: EditRecord[] = [];

  /** Redo 스택 (끝에서 push/pop) */
  private redoLog: EditRecord[] = [];

  private readonly maxSize: number;

  private onChange?: (canUndo: boolean, canRedo: boolean) => void;

  constructor(
    private readonly store: AnnotationStore,
    options: EditHistoryOptions = {}
  ) {
    this.maxSize = options.maxSize ?? Infinity;
    this.onChange = options.onChange;
  }

  // ---------------------------------------------------------------------------
  // 기록
  // ---------------------------------------------------------------------------

  /**
   * 편집 기록 추가
   *
   * 새 기록이 들어오면 Redo 불가
   */
  record(edit: EditRecord): void {
    this.undoLog.push(edit);

    // 스택 크기 제한
    while (this.undoLog.length > this.maxSize) {
      this.undoLog.shift();
    }

    this.redoLog = [];
    this.notifyChange();
  }

  // ---------------------------------------------------------------------------
  // Undo/Redo
  // ---------------------------------------------------------------------------

  canUndo(): boolean {
    return this.undoLog.length > 0;
  }

  canRedo(): boolean {
    return this.redoLog.length > 0;
  }

  /**
   * Undo 실행
   *
   * @returns 되돌린 기록
   * @throws AnnotationError(EMPTY_HISTORY)
   */
  undo(): EditRecord {
    const edit = this.undoLog.at(-1);
    if (!edit) {
      throw AnnotationError.emptyHistory('undo');
    }

    // 적용에 성공한 경우에만 스택 이동
    this.applyInverse(edit);
    this.undoLog.pop();
    this.redoLog.push(edit);
    this.notifyChange();

    return edit;
  }

  /**
   * Redo 실행
   *
   * @returns 다시 적용한 기록
   * @throws AnnotationError(EMPTY_HISTORY)
   */
  redo(): EditRecord {
    const edit = this.redoLog.at(-1);
    if (!edit) {
      throw AnnotationError.emptyHistory('redo');
    }

    // 적용에 성공한 경우에만 스택 이동
    this.applyForward(edit);
    this.redoLog.pop();
    this.undoLog.push(edit);
    this.notifyChange();

    return edit;
  }

  // ---------------------------------------------------------------------------
  // 스택 관리
  // ---------------------------------------------------------------------------

  /**
   * 히스토리 초기화
   */
  clear(): void {
    this.undoLog = [];
    this.redoLog = [];
    this.notifyChange();
  }

  getState(): HistoryState {
    return {
      undoCount: this.undoLog.length,
      redoCount: this.redoLog.length,
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
    };
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private applyInverse(edit: EditRecord): void {
    switch (edit.kind) {
      case 'addSkeleton':
        this.store.removeSkeleton(edit.skeleton.id);
        break;

      case 'moveKeypoint':
        this.store.setKeypoint(edit.skeletonId, edit.part, edit.oldPosition);
        break;

      case 'deleteKeypoint':
        this.store.setKeypoint(edit.skeletonId, edit.part, edit.oldPosition);
        break;

      case 'resetAll':
        this.store.replaceAll(edit.previous);
        break;

      default:
        assertNever(edit);
    }
  }

  private applyForward(edit: EditRecord): void {
    switch (edit.kind) {
      case 'addSkeleton':
        // 재계산하지 않고 기록된 ID 그대로 복원
        this.store.restoreSkeleton(edit.skeleton);
        break;

      case 'moveKeypoint':
        this.store.setKeypoint(edit.skeletonId, edit.part, edit.newPosition);
        break;

      case 'deleteKeypoint':
        this.store.setKeypoint(edit.skeletonId, edit.part, null);
        break;

      case 'resetAll':
        this.store.resetAll();
        break;

      default:
        assertNever(edit);
    }
  }

  private notifyChange(): void {
    if (this.onChange) {
      this.onChange(this.canUndo(), this.canRedo());
    }
  }
}

function assertNever(edit: never): never {
  throw new Error(`[EditHistory] Unknown edit record: ${JSON.stringify(edit)}`);
}
