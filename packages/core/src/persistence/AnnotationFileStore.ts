/**
 * Annotation File Store
 *
 * 이미지별 라벨 파일 (<이미지 이름>.txt) 저장/로드/삭제
 *
 * 규칙:
 * - 파일이 없으면 "어노테이션 없음"
 * - 저장할 라인이 없으면 파일을 쓰지 않고 기존 파일 삭제 (빈 파일 남기지 않음)
 * - 입출력 실패는 AnnotationError(IO_FAILURE)로 변환, 메모리 상태는 건드리지 않음
 */

import type { ImageSize } from '../types';
import type { Skeleton } from '../skeleton';
import { AnnotationError } from '../errors';
import {
  poseFormatCodec,
  type PoseDecodeOptions,
  type PoseDecodeResult,
  type PoseFormatCodec,
} from '../format';
import type { PersistenceIO, SaveOutcome } from './types';

/** 라벨 파일 확장자 */
export const LABEL_FILE_EXTENSION = '.txt';

/**
 * 이미지 파일 이름 → 라벨 파일 이름
 *
 * 경로와 확장자를 제거하고 .txt를 붙임
 *
 * @example
 * labelFileNameFor('frames/clip_0001.jpg') // 'clip_0001.txt'
 */
export function labelFileNameFor(imageName: string): string {
  const base = imageName.split(/[\\/]/).pop() ?? imageName;
  const dot = base.lastIndexOf('.');
  const stem = dot > 0 ? base.slice(0, dot) : base;
  return `${stem}${LABEL_FILE_EXTENSION}`;
}

export class AnnotationFileStore {
  constructor(
    private readonly io: PersistenceIO,
    private readonly saveDirectory: string,
    private readonly codec: PoseFormatCodec = poseFormatCodec
  ) {}

  labelPathFor(imageName: string): string {
    return this.io.join(this.saveDirectory, labelFileNameFor(imageName));
  }

  /**
   * 라벨 파일 저장
   *
   * @returns written 또는 deleted (저장할 라인 없음)
   * @throws AnnotationError(IO_FAILURE)
   */
  async save(
    imageName: string,
    skeletons: ReadonlyArray<Readonly<Skeleton>>,
    imageSize: ImageSize
  ): Promise<SaveOutcome> {
    const path = this.labelPathFor(imageName);
    const text = this.codec.encode(skeletons, imageSize);

    try {
      if (text === null) {
        const deleted = await this.io.deleteFile(path);
        if (deleted) {
          console.log(`[AnnotationFileStore] Removed ${path} (no annotations)`);
        }
        return 'deleted';
      }

      await this.io.writeFile(path, text);
      console.log(`[AnnotationFileStore] Annotations saved to ${path}`);
      return 'written';
    } catch (error) {
      throw AnnotationError.fromIOError(error, path);
    }
  }

  /**
   * 라벨 파일 로드
   *
   * @returns 디코딩 결과, 파일이 없으면 null
   * @throws AnnotationError(IO_FAILURE)
   */
  async load(
    imageName: string,
    imageSize: ImageSize,
    options?: PoseDecodeOptions
  ): Promise<PoseDecodeResult | null> {
    const path = this.labelPathFor(imageName);

    let text: string | null;
    try {
      text = await this.io.readFile(path);
    } catch (error) {
      throw AnnotationError.fromIOError(error, path);
    }

    if (text === null) {
      return null;
    }

    return this.codec.decode(text, imageSize, options);
  }

  /**
   * 라벨 파일 삭제
   *
   * @returns 실제로 삭제했는지 여부
   * @throws AnnotationError(IO_FAILURE)
   */
  async remove(imageName: string): Promise<boolean> {
    const path = this.labelPathFor(imageName);

    try {
      const deleted = await this.io.deleteFile(path);
      if (deleted) {
        console.log(`[AnnotationFileStore] Annotation file ${path} deleted`);
      }
      return deleted;
    } catch (error) {
      throw AnnotationError.fromIOError(error, path);
    }
  }
}
