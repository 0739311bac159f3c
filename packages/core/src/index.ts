/**
 * @keymark/core
 *
 * 총기 스켈레톤 키포인트 어노테이션 코어 (프레임워크 무관)
 *
 * 모듈 구조:
 * - skeleton: 변형별 토폴로지, 스켈레톤 엔티티
 * - coordinates: 뷰 ↔ 이미지 좌표 변환, 줌/팬
 * - interaction: 키포인트 히트 테스트
 * - annotations: 저장소, Undo/Redo 히스토리
 * - format: 포즈 라벨 라인 인코딩/디코딩
 * - persistence: 이미지별 라벨 파일
 * - session: 위 모듈을 묶는 편집 세션, 키 바인딩
 */

export const VERSION = '0.0.1';

// Shared
export type { Point, ImageSize } from './types';

// Errors
export { AnnotationError, isAnnotationError } from './errors';
export type { AnnotationErrorType } from './errors';

// Skeleton
export {
  SkeletonVariant,
  SKELETON_TOPOLOGIES,
  SKELETON_VARIANTS,
  getTopology,
  variantFromClassIndex,
  isPartOf,
  createSkeleton,
  createSkeletonFrom,
  cloneSkeleton,
  freezeSkeleton,
  getPresentKeypoints,
  copySlot,
  nextSkeletonId,
} from './skeleton';
export type {
  PartName,
  PartConnection,
  SkeletonTopology,
  KeypointPosition,
  KeypointSlot,
  Skeleton,
  PresentKeypoint,
} from './skeleton';

// Coordinates
export { ViewTransform, clampToImage, truncatePoint } from './coordinates';
export type { ViewState, ViewTransformOptions, IViewTransform } from './coordinates';

// Interaction
export { HitTester, DEFAULT_HIT_TOLERANCE } from './interaction';
export type { KeypointHit } from './interaction';

// Annotations
export { AnnotationStore, EditHistory } from './annotations';
export type {
  AnnotationStoreOptions,
  EditHistoryOptions,
  EditRecord,
  EditKind,
  AddSkeletonEdit,
  MoveKeypointEdit,
  DeleteKeypointEdit,
  ResetAllEdit,
  KeypointMoveResult,
  HistoryState,
} from './annotations';

// Format
export {
  PoseFormatCodec,
  poseFormatCodec,
  formatCoordinate,
  COORDINATE_PRECISION,
  ABSENT_COORDINATE,
} from './format';
export type { PoseDecodeOptions, PoseDecodeResult } from './format';

// Persistence
export {
  AnnotationFileStore,
  createNodePersistence,
  labelFileNameFor,
  LABEL_FILE_EXTENSION,
} from './persistence';
export type { PersistenceIO, SaveOutcome } from './persistence';

// Session
export {
  AnnotationSession,
  DEFAULT_SESSION_CONFIG,
  resolveKeyAction,
  getModifiers,
  KeyboardModifiers,
  DEFAULT_KEY_BINDINGS,
} from './session';
export type {
  AnnotationSessionOptions,
  SessionConfig,
  SessionState,
  SessionNotice,
  SessionNoticeType,
  SessionNoticeLevel,
  ImageInfo,
  ImageProvider,
  KeyAction,
  KeyInput,
  KeyBinding,
  PointerModifiers,
} from './session';
