export {
  PoseFormatCodec,
  poseFormatCodec,
  formatCoordinate,
  COORDINATE_PRECISION,
  ABSENT_COORDINATE,
} from './PoseFormatCodec';
export type { PoseDecodeOptions, PoseDecodeResult } from './PoseFormatCodec';
