/**
 * Persistence Type Definitions
 *
 * 라벨 파일 입출력 인터페이스
 *
 * 구현:
 * - createNodePersistence(): node:fs 기반
 * - 테스트: 메모리 기반 구현 주입
 */

/**
 * 파일 입출력
 */
export interface PersistenceIO {
  /**
   * 파일 읽기
   *
   * @returns 파일 내용, 파일이 없으면 null
   */
  readFile(path: string): Promise<string | null>;

  /**
   * 파일 쓰기 (덮어쓰기)
   */
  writeFile(path: string, text: string): Promise<void>;

  /**
   * 파일 삭제 (없으면 무시)
   *
   * @returns 실제로 삭제했는지 여부
   */
  deleteFile(path: string): Promise<boolean>;

  /**
   * 경로 결합
   */
  join(directory: string, fileName: string): string;
}

/**
 * save() 결과
 * - written: 라벨 파일 기록
 * - deleted: 저장할 라인이 없어 기존 파일 삭제 (또는 원래 없음)
 */
export type SaveOutcome = 'written' | 'deleted';
