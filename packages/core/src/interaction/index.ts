export { HitTester, DEFAULT_HIT_TOLERANCE } from './HitTester';
export type { KeypointHit } from './HitTester';
