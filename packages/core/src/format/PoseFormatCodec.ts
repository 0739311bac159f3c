/**
 * Pose Format Codec
 *
 * 스켈레톤 ↔ 포즈 추정 라벨 라인 변환
 *
 * 라인 형식 (공백 구분):
 *   <class> <cx> <cy> <w> <h> <x1> <y1> ... <xn> <yn>
 *
 * - class: 변형의 클래스 인덱스 (Lmg 0, Rifle 1)
 * - 좌표는 이미지 크기로 나눈 정규화 값, 소수점 6자리
 * - 없는 키포인트는 "-1 -1"
 * - 박스는 존재하는 키포인트만으로 계산한 외접 사각형
 * - 키포인트가 하나도 없는 스켈레톤은 라인을 만들지 않음
 */

import type { ImageSize } from '../types';
import {
  getPresentKeypoints,
  getTopology,
  nextSkeletonId,
  variantFromClassIndex,
  createSkeletonFrom,
  type KeypointSlot,
  type PartName,
  type Skeleton,
} from '../skeleton';

// =============================================================================
// Constants
// =============================================================================

/** 좌표 소수점 자릿수 */
export const COORDINATE_PRECISION = 6;

/** 없는 키포인트 표기 */
export const ABSENT_COORDINATE = '-1';

/** 라인 헤더 필드 수 (class + box 4개) */
const HEADER_FIELD_COUNT = 5;

// =============================================================================
// Types
// =============================================================================

/**
 * 디코딩 옵션
 */
export interface PoseDecodeOptions {
  /**
   * 라인 끝의 키포인트 필드가 모자랄 때 처리
   * - unset: 슬롯을 미설정으로 둠 (기본, 기존 라벨 파일과 동일한 해석)
   * - absent: 없음(-1 -1)과 동일하게 취급
   */
  missingKeypoints?: 'unset' | 'absent';
}

/**
 * 디코딩 결과
 */
export interface PoseDecodeResult {
  /** 디코딩된 스켈레톤 (라인 순서, ID 1부터 재사용 알고리즘으로 할당) */
  skeletons: Skeleton[];
  /** 스킵된 라인 경고 (MALFORMED_LINE) */
  warnings: string[];
  /** 스킵된 라인 수 */
  skippedCount: number;
}

// =============================================================================
// Codec
// =============================================================================

export class PoseFormatCodec {
  /**
   * 스켈레톤 목록을 라벨 텍스트로 인코딩
   *
   * @returns 라벨 텍스트, 저장할 라인이 없으면 null
   */
  encode(skeletons: ReadonlyArray<Readonly<Skeleton>>, imageSize: ImageSize): string | null {
    const lines: string[] = [];

    for (const skeleton of skeletons) {
      const line = this.encodeSkeleton(skeleton, imageSize);
      if (line !== null) {
        lines.push(line);
      }
    }

    return lines.length > 0 ? lines.join('\n') : null;
  }

  /**
   * 단일 스켈레톤 인코딩
   *
   * @returns 라인 또는 null (존재하는 키포인트 없음)
   */
  encodeSkeleton(skeleton: Readonly<Skeleton>, imageSize: ImageSize): string | null {
    const { width, height } = imageSize;
    const topology = getTopology(skeleton.variant);

    if (getPresentKeypoints(skeleton).length === 0) {
      return null;
    }

    const fields: string[] = [];
    const xs: number[] = [];
    const ys: number[] = [];

    for (const part of topology.parts) {
      const slot = skeleton.keypoints[part];
      if (slot) {
        const nx = slot.x / width;
        const ny = slot.y / height;
        xs.push(nx);
        ys.push(ny);
        fields.push(formatCoordinate(nx), formatCoordinate(ny));
      } else {
        fields.push(ABSENT_COORDINATE, ABSENT_COORDINATE);
      }
    }

    const minX = Math.min(...xs);
    const maxX = Math.max(...xs);
    const minY = Math.min(...ys);
    const maxY = Math.max(...ys);

    const box = [(minX + maxX) / 2, (minY + maxY) / 2, maxX - minX, maxY - minY];

    return [String(topology.classIndex), ...box.map(formatCoordinate), ...fields].join(' ');
  }

  /**
   * 라벨 텍스트 디코딩
   *
   * 파싱할 수 없는 라인은 경고와 함께 스킵하고 나머지 라인을 계속 처리
   */
  decode(text: string, imageSize: ImageSize, options: PoseDecodeOptions = {}): PoseDecodeResult {
    const result: PoseDecodeResult = {
      skeletons: [],
      warnings: [],
      skippedCount: 0,
    };

    const lines = text.split(/\r?\n/);

    lines.forEach((line, index) => {
      const fields = line.trim().split(/\s+/).filter((f) => f.length > 0);
      if (fields.length === 0) {
        return;
      }

      const usedIds = result.skeletons.map((s) => s.id);
      const skeleton = this.decodeFields(fields, nextSkeletonId(usedIds), imageSize, options);

      if (typeof skeleton === 'string') {
        const warning = `Line ${index + 1}: ${skeleton}`;
        console.warn(`[PoseFormatCodec] Skipped malformed line. ${warning}`);
        result.warnings.push(warning);
        result.skippedCount++;
        return;
      }

      result.skeletons.push(skeleton);
    });

    return result;
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * 필드 배열 → 스켈레톤
   *
   * @returns 스켈레톤 또는 스킵 사유
   */
  private decodeFields(
    fields: string[],
    id: number,
    imageSize: ImageSize,
    options: PoseDecodeOptions
  ): Skeleton | string {
    if (fields.length < HEADER_FIELD_COUNT) {
      return `expected at least ${HEADER_FIELD_COUNT} fields, got ${fields.length}`;
    }

    const classIndex = Number(fields[0]);
    if (!Number.isInteger(classIndex)) {
      return `invalid class index "${fields[0]}"`;
    }

    const header = fields.slice(1, HEADER_FIELD_COUNT).map(Number);
    if (!header.every(Number.isFinite)) {
      return 'invalid bounding box';
    }

    const variant = variantFromClassIndex(classIndex);
    const coordinates = fields.slice(HEADER_FIELD_COUNT);
    const values: Partial<Record<PartName, KeypointSlot>> = {};

    const parts = getTopology(variant).parts;
    for (let i = 0; i < parts.length; i++) {
      const part = parts[i];
      const xIndex = i * 2;

      // 필드가 모자라면 미설정으로 둠
      if (xIndex + 1 >= coordinates.length) {
        if (options.missingKeypoints === 'absent') {
          values[part] = null;
        }
        continue;
      }

      const x = Number(coordinates[xIndex]);
      const y = Number(coordinates[xIndex + 1]);
      if (!Number.isFinite(x) || !Number.isFinite(y)) {
        return `invalid coordinate for "${part}"`;
      }

      values[part] =
        x >= 0 && y >= 0 ? { x: x * imageSize.width, y: y * imageSize.height } : null;
    }

    return createSkeletonFrom(id, variant, values);
  }
}

/** 중간값 판정에 쓰는 자릿수 (double의 정확한 10진 전개를 덮는 길이) */
const TIE_CHECK_DIGITS = 30;

/**
 * 정규화 좌표 포맷 (소수점 6자리)
 *
 * toFixed는 정확한 중간값(예: 0.0078125)을 올림하지만 라벨 파일은
 * 짝수 쪽으로 반올림 (0.0078125 → 0.007812, 0.0234375 → 0.023438)
 */
export function formatCoordinate(value: number): string {
  const rounded = value.toFixed(COORDINATE_PRECISION);

  const expanded = value.toFixed(TIE_CHECK_DIGITS);
  const cut = expanded.indexOf('.') + 1 + COORDINATE_PRECISION;
  if (!/^50*$/.test(expanded.slice(cut))) {
    return rounded;
  }

  const truncated = expanded.slice(0, cut);
  return Number(truncated[truncated.length - 1]) % 2 === 0 ? truncated : rounded;
}

/**
 * 기본 코덱 인스턴스
 */
export const poseFormatCodec = new PoseFormatCodec();
