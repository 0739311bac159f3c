import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AnnotationStore } from '../src/annotations';
import { SkeletonVariant, type Skeleton } from '../src/skeleton';
import { captureAnnotationError } from './helpers/errors';

describe('AnnotationStore', () => {
  const imageSize = { width: 640, height: 480 };
  const center = { x: 320, y: 240 };

  let store: AnnotationStore;

  beforeEach(() => {
    store = new AnnotationStore({ imageSize });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('addSkeleton', () => {
    it('assigns ids 1, 2, 3 in order', () => {
      const ids = [
        store.addSkeleton(SkeletonVariant.Lmg, center).id,
        store.addSkeleton(SkeletonVariant.Rifle, center).id,
        store.addSkeleton(SkeletonVariant.Lmg, center).id,
      ];

      expect(ids).toEqual([1, 2, 3]);
      expect(store.count).toBe(3);
    });

    it('reuses the id of a removed skeleton', () => {
      store.addSkeleton(SkeletonVariant.Lmg, center);
      store.addSkeleton(SkeletonVariant.Lmg, center);
      store.addSkeleton(SkeletonVariant.Lmg, center);

      store.removeSkeleton(2);
      expect(store.getRetiredIds()).toEqual([2]);

      const added = store.addSkeleton(SkeletonVariant.Rifle, center);
      expect(added.id).toBe(2);
      expect(store.getRetiredIds()).toEqual([]);
      expect(store.snapshot().map((s) => s.id)).toEqual([1, 3, 2]);
    });

    it('places default keypoints around the anchor', () => {
      const skeleton = store.addSkeleton(SkeletonVariant.Lmg, center);

      expect(skeleton.keypoints['butt']).toEqual({ x: 220, y: 240 });
      expect(skeleton.keypoints['right bipod']).toEqual({ x: 470, y: 190 });
    });
  });

  describe('moveKeypoint', () => {
    it('clamps to the image bounds', () => {
      store.addSkeleton(SkeletonVariant.Lmg, center);

      const result = store.moveKeypoint(1, 'butt', { x: -5, y: 10000 });

      expect(result).toEqual({ oldPosition: { x: 220, y: 240 }, newPosition: { x: 0, y: 479 } });
      expect(store.get(1)?.keypoints['butt']).toEqual({ x: 0, y: 479 });
    });

    it('rejects a part the variant does not define', () => {
      store.addSkeleton(SkeletonVariant.Lmg, center);

      const error = captureAnnotationError(() => store.moveKeypoint(1, 'barrel', { x: 0, y: 0 }));

      expect(error.type).toBe('INVALID_PART');
      expect(error.message).toBe('Part "barrel" is not defined for Lmg');
      expect(console.error).toHaveBeenCalledWith('[AnnotationStore] Invalid part "barrel" for LMG');
    });

    it('rejects an unknown skeleton id', () => {
      const error = captureAnnotationError(() => store.moveKeypoint(9, 'butt', { x: 0, y: 0 }));

      expect(error.type).toBe('NOT_FOUND');
      expect(error.message).toBe('Skeleton not found: 9');
    });
  });

  describe('deleteKeypoint', () => {
    it('marks the keypoint absent and returns its previous value', () => {
      store.addSkeleton(SkeletonVariant.Rifle, center);

      const old = store.deleteKeypoint(1, 'barrel');

      expect(old).toEqual({ x: 420, y: 240 });
      expect(store.get(1)?.keypoints['barrel']).toBeNull();
    });

    it('rejects an unknown skeleton id', () => {
      expect(captureAnnotationError(() => store.deleteKeypoint(4, 'butt')).type).toBe('NOT_FOUND');
    });
  });

  describe('removeSkeleton', () => {
    it('throws NOT_FOUND for a missing id', () => {
      expect(captureAnnotationError(() => store.removeSkeleton(1)).type).toBe('NOT_FOUND');
    });
  });

  describe('resetAll', () => {
    it('clears skeletons and retired ids', () => {
      store.addSkeleton(SkeletonVariant.Lmg, center);
      store.addSkeleton(SkeletonVariant.Lmg, center);
      store.removeSkeleton(1);

      store.resetAll();

      expect(store.count).toBe(0);
      expect(store.getRetiredIds()).toEqual([]);
      expect(store.allocateId()).toBe(1);
    });
  });

  describe('snapshot', () => {
    it('is not affected by later edits', () => {
      store.addSkeleton(SkeletonVariant.Lmg, center);
      const before = store.snapshot();

      store.moveKeypoint(1, 'cover', { x: 10, y: 10 });

      expect(before[0].keypoints['cover']).toEqual({ x: 320, y: 240 });
      expect(Object.isFrozen(before)).toBe(true);
    });
  });

  describe('restoreSkeleton', () => {
    it('re-inserts a snapshot with its own id and un-retires it', () => {
      const added = store.addSkeleton(SkeletonVariant.Rifle, center);
      store.removeSkeleton(added.id);

      store.restoreSkeleton(added);

      expect(store.get(1)).toEqual(added);
      expect(store.getRetiredIds()).toEqual([]);
    });

    it('refuses an id that is already live', () => {
      const added = store.addSkeleton(SkeletonVariant.Rifle, center);

      expect(() => store.restoreSkeleton(added)).toThrow(
        '[AnnotationStore] Skeleton id already in use: 1'
      );
    });
  });

  describe('onChange', () => {
    it('receives a snapshot after every mutation', () => {
      const onChange = vi.fn<(skeletons: ReadonlyArray<Readonly<Skeleton>>) => void>();
      const observed = new AnnotationStore({ imageSize, onChange });

      observed.addSkeleton(SkeletonVariant.Lmg, center);
      observed.deleteKeypoint(1, 'butt');

      expect(onChange).toHaveBeenCalledTimes(2);
      expect(onChange.mock.lastCall?.[0][0].keypoints['butt']).toBeNull();
    });
  });

  it('rejects an empty image size', () => {
    expect(() => new AnnotationStore({ imageSize: { width: 0, height: 480 } })).toThrow(RangeError);
  });
});
