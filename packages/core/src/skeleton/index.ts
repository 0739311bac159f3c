/**
 * Skeleton Module
 *
 * 스켈레톤 토폴로지(설정 데이터)와 엔티티 헬퍼
 */

export * from './types';
export {
  SKELETON_TOPOLOGIES,
  SKELETON_VARIANTS,
  getTopology,
  variantFromClassIndex,
  isPartOf,
} from './topology';
export {
  createSkeleton,
  createSkeletonFrom,
  cloneSkeleton,
  freezeSkeleton,
  getPresentKeypoints,
  copySlot,
  nextSkeletonId,
} from './Skeleton';
