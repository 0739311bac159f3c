/**
 * Skeleton Topology
 *
 * 변형별 파트 목록, 연결, 클래스 인덱스, 기본 오프셋
 *
 * 파트 순서는 라벨 파일의 키포인트 순서이므로 변경 금지
 */

import { SkeletonVariant, type SkeletonTopology } from './types';

const LMG_TOPOLOGY: SkeletonTopology = {
  variant: SkeletonVariant.Lmg,
  label: 'LMG',
  classIndex: 0,
  parts: [
    'butt',
    'pistol grip',
    'trigger',
    'cover',
    'rear sight',
    'barrel jacket',
    'left bipod',
    'right bipod',
  ],
  connections: [
    ['butt', 'cover'],
    ['cover', 'pistol grip'],
    ['cover', 'trigger'],
    ['cover', 'rear sight'],
    ['rear sight', 'barrel jacket'],
    ['barrel jacket', 'left bipod'],
    ['barrel jacket', 'right bipod'],
  ],
  defaultOffsets: {
    'butt': { x: -100, y: 0 },
    'pistol grip': { x: -50, y: 50 },
    'trigger': { x: 0, y: 20 },
    'cover': { x: 0, y: 0 },
    'rear sight': { x: 50, y: -30 },
    'barrel jacket': { x: 100, y: 0 },
    'left bipod': { x: 150, y: 50 },
    'right bipod': { x: 150, y: -50 },
  },
};

const RIFLE_TOPOLOGY: SkeletonTopology = {
  variant: SkeletonVariant.Rifle,
  label: 'Rifle',
  classIndex: 1,
  parts: ['butt', 'rear sight', 'pistol grip', 'trigger', 'front handguard', 'barrel'],
  connections: [
    ['butt', 'rear sight'],
    ['rear sight', 'pistol grip'],
    ['rear sight', 'trigger'],
    ['rear sight', 'front handguard'],
    ['front handguard', 'barrel'],
  ],
  defaultOffsets: {
    'butt': { x: -100, y: 0 },
    'rear sight': { x: -50, y: -30 },
    'pistol grip': { x: -10, y: 50 },
    'trigger': { x: 0, y: 20 },
    'front handguard': { x: 50, y: 0 },
    'barrel': { x: 100, y: 0 },
  },
};

/**
 * 변형 → 토폴로지 테이블
 */
export const SKELETON_TOPOLOGIES: Readonly<Record<SkeletonVariant, SkeletonTopology>> = {
  [SkeletonVariant.Lmg]: LMG_TOPOLOGY,
  [SkeletonVariant.Rifle]: RIFLE_TOPOLOGY,
};

/**
 * 정의된 변형 목록 (표시 순서)
 */
export const SKELETON_VARIANTS: readonly SkeletonVariant[] = [
  SkeletonVariant.Lmg,
  SkeletonVariant.Rifle,
];

export function getTopology(variant: SkeletonVariant): SkeletonTopology {
  return SKELETON_TOPOLOGIES[variant];
}

/**
 * 클래스 인덱스 → 변형
 *
 * 0은 Lmg, 그 외 값은 모두 Rifle
 */
export function variantFromClassIndex(classIndex: number): SkeletonVariant {
  return classIndex === LMG_TOPOLOGY.classIndex ? SkeletonVariant.Lmg : SkeletonVariant.Rifle;
}

export function isPartOf(variant: SkeletonVariant, part: string): boolean {
  return SKELETON_TOPOLOGIES[variant].parts.includes(part);
}
