/**
 * 어노테이션 에러 타입
 *
 * 실패 종류를 구분해 호출자가 종류별로 다르게 처리할 수 있음
 * 어떤 종류도 프로세스를 중단시키지 않음
 */
export type AnnotationErrorType =
  | 'NOT_FOUND' // 스켈레톤 ID 또는 파트 없음
  | 'INVALID_PART' // 스켈레톤 변형에 없는 파트 이름
  | 'EMPTY_HISTORY' // Undo/Redo 할 기록 없음
  | 'MALFORMED_LINE' // 라벨 파일의 파싱 불가 라인
  | 'IO_FAILURE'; // 파일 읽기/쓰기 실패

/**
 * 어노테이션 에러 클래스
 */
export class AnnotationError extends Error {
  readonly type: AnnotationErrorType;

  constructor(message: string, type: AnnotationErrorType, cause?: unknown) {
    super(message, { cause });
    this.name = 'AnnotationError';
    this.type = type;

    // Error 클래스를 상속할 때 필요한 프로토타입 체인 수정
    Object.setPrototypeOf(this, AnnotationError.prototype);
  }

  static notFound(skeletonId: number): AnnotationError {
    return new AnnotationError(`Skeleton not found: ${skeletonId}`, 'NOT_FOUND');
  }

  static invalidPart(part: string, variant: string): AnnotationError {
    return new AnnotationError(`Part "${part}" is not defined for ${variant}`, 'INVALID_PART');
  }

  static emptyHistory(direction: 'undo' | 'redo'): AnnotationError {
    return new AnnotationError(`No actions to ${direction}.`, 'EMPTY_HISTORY');
  }

  /**
   * fs 에러 등 임의의 에러로부터 IO_FAILURE 생성
   */
  static fromIOError(error: unknown, path: string): AnnotationError {
    if (error instanceof AnnotationError) {
      return error;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new AnnotationError(`I/O failure on ${path}: ${message}`, 'IO_FAILURE', error);
  }
}

/**
 * AnnotationError 타입 가드
 */
export function isAnnotationError(error: unknown): error is AnnotationError {
  return error instanceof AnnotationError;
}
