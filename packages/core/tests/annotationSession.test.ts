import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AnnotationSession,
  type AnnotationSessionOptions,
  type ImageProvider,
  type SessionNotice,
  type SessionState,
} from '../src/session';
import { poseFormatCodec } from '../src/format';
import { SkeletonVariant } from '../src/skeleton';
import {
  DeferredPersistence,
  FailingPersistence,
  MemoryPersistence,
} from './helpers/MemoryPersistence';

describe('AnnotationSession', () => {
  const image = { name: 'frames/a.png', width: 640, height: 480 };

  let io: MemoryPersistence;
  let notices: SessionNotice[];

  const createSession = (options: AnnotationSessionOptions = {}) =>
    new AnnotationSession({
      persistence: io,
      onNotice: (notice) => notices.push(notice),
      ...options,
    });

  const listProvider = (names: string[]): ImageProvider => ({
    count: names.length,
    getImage: (index) => ({ name: names[index], width: 640, height: 480 }),
  });

  beforeEach(() => {
    io = new MemoryPersistence();
    notices = [];
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('without an image', () => {
    it('reports NO_IMAGE and does nothing', async () => {
      const session = createSession();

      expect(session.addSkeleton(SkeletonVariant.Lmg)).toBeNull();
      session.undo();
      await session.resetAll();

      expect(notices).toEqual([
        { type: 'NO_IMAGE', level: 'warning', message: 'No Image Loaded' },
        { type: 'NO_IMAGE', level: 'warning', message: 'No Image Loaded' },
        { type: 'NO_IMAGE', level: 'warning', message: 'No Image Loaded' },
      ]);
      expect(session.getState().skeletons).toEqual([]);
    });
  });

  describe('editing', () => {
    it('anchors a new skeleton at the floored image center and selects it', async () => {
      const session = createSession();
      await session.loadImage({ name: 'odd.png', width: 641, height: 481 });

      const skeleton = session.addSkeleton(SkeletonVariant.Lmg);

      expect(skeleton?.keypoints['cover']).toEqual({ x: 320, y: 240 });
      expect(session.getState()).toMatchObject({ selectedSkeletonId: 1, canUndo: true });
      expect(notices).toEqual([
        { type: 'SKELETON_ADDED', level: 'info', message: 'Selected LMG Skeleton.' },
      ]);
    });

    it('records one move per pointer move and undoes them in order', async () => {
      const session = createSession();
      await session.loadImage(image);
      session.addSkeleton(SkeletonVariant.Lmg);

      const hit = session.pointerDown({ x: 222, y: 241 });
      session.pointerMove({ x: 225.7, y: 250.2 });
      session.pointerMove({ x: -50, y: 1000 });
      session.pointerUp();

      const butt = () => session.getState().skeletons[0]?.keypoints['butt'];

      expect(hit).toMatchObject({ skeletonId: 1, part: 'butt' });
      expect(butt()).toEqual({ x: 0, y: 479 });

      session.undo();
      expect(butt()).toEqual({ x: 225, y: 250 });

      session.undo();
      expect(butt()).toEqual({ x: 220, y: 240 });

      session.undo();
      expect(session.getState()).toMatchObject({
        skeletons: [],
        selectedSkeletonId: null,
        selectedPart: null,
      });
    });

    it('ignores pointer moves after the pointer is released', async () => {
      const session = createSession();
      await session.loadImage(image);
      session.addSkeleton(SkeletonVariant.Lmg);

      session.pointerDown({ x: 220, y: 240 });
      session.pointerUp();
      session.pointerMove({ x: 10, y: 10 });

      expect(session.getState().skeletons[0]?.keypoints['butt']).toEqual({ x: 220, y: 240 });
    });

    it('keeps the selection when the pointer misses', async () => {
      const session = createSession();
      await session.loadImage(image);
      session.addSkeleton(SkeletonVariant.Lmg);
      session.pointerDown({ x: 220, y: 240 });
      session.pointerUp();

      expect(session.pointerDown({ x: 5, y: 5 })).toBeNull();
      expect(session.getState()).toMatchObject({ selectedSkeletonId: 1, selectedPart: 'butt' });
    });

    it('deletes the selected keypoint and restores it on undo', async () => {
      const session = createSession();
      await session.loadImage(image);
      session.addSkeleton(SkeletonVariant.Lmg);
      session.pointerDown({ x: 220, y: 240 });
      session.pointerUp();

      session.deleteSelectedKeypoint();

      expect(session.getState().skeletons[0]?.keypoints['butt']).toBeNull();
      expect(session.getState().selectedPart).toBeNull();

      session.undo();
      expect(session.getState().skeletons[0]?.keypoints['butt']).toEqual({ x: 220, y: 240 });
    });

    it('reports EMPTY_HISTORY as an info notice', async () => {
      const session = createSession();
      await session.loadImage(image);

      session.undo();
      session.redo();

      expect(notices).toEqual([
        { type: 'EMPTY_HISTORY', level: 'info', message: 'No actions to undo.' },
        { type: 'EMPTY_HISTORY', level: 'info', message: 'No actions to redo.' },
      ]);
    });

    it('resets and undoes the reset', async () => {
      const session = createSession();
      await session.loadImage(image);
      session.addSkeleton(SkeletonVariant.Lmg);
      session.addSkeleton(SkeletonVariant.Rifle);

      await session.resetAll();
      expect(session.getState().skeletons).toEqual([]);

      session.undo();
      expect(session.getState().skeletons.map((s) => s.id)).toEqual([1, 2]);
    });
  });

  describe('view', () => {
    it('pans with Ctrl+drag and hit-tests through the new offset', async () => {
      const session = createSession();
      await session.loadImage(image);
      session.addSkeleton(SkeletonVariant.Lmg);

      expect(session.pointerDown({ x: 0, y: 0 }, { ctrlKey: true })).toBeNull();
      session.pointerMove({ x: 15, y: -5 });
      session.pointerUp();

      expect(session.getState().pan).toEqual({ x: 15, y: -5 });
      expect(session.pointerDown({ x: 235, y: 235 })).toEqual({
        skeletonId: 1,
        part: 'butt',
        distance: 0,
      });
    });

    it('zooms with the wheel', async () => {
      const session = createSession();
      await session.loadImage(image);

      session.wheel(-120);
      expect(session.getState().zoomPercent).toBe(110);

      session.wheel(120);
      expect(session.getState().zoomPercent).toBe(100);
    });

    it('resets the view when a new image loads', async () => {
      const session = createSession();
      await session.loadImage(image);
      session.wheel(-120);

      await session.loadImage({ name: 'b.png', width: 640, height: 480 });

      expect(session.getState()).toMatchObject({ zoom: 1, pan: { x: 0, y: 0 } });
    });
  });

  describe('persistence', () => {
    it('asks for a save folder when none is set', async () => {
      const session = createSession();
      await session.loadImage(image);

      expect(await session.save()).toBeNull();
      expect(notices).toEqual([
        { type: 'NO_SAVE_DIRECTORY', level: 'warning', message: 'No Save Folder Selected' },
      ]);
    });

    it('writes the label file named after the image', async () => {
      const session = createSession({ saveDirectory: '/labels' });
      await session.loadImage(image);
      session.addSkeleton(SkeletonVariant.Rifle);

      expect(await session.save()).toBe('written');
      expect(io.files.get('/labels/a.txt')).toBe(
        poseFormatCodec.encode(session.getState().skeletons, image)
      );
      expect(notices.at(-1)).toEqual({ type: 'SAVED', level: 'info', message: 'Annotations saved.' });
    });

    it('deletes the label file when saving an empty image', async () => {
      io.files.set('/labels/a.txt', '0 0.5 0.5 0 0 0.5 0.5');
      const session = createSession({ saveDirectory: '/labels' });
      await session.loadImage(image);
      await session.resetAll();

      expect(await session.save()).toBe('deleted');
      expect(io.files.has('/labels/a.txt')).toBe(false);
    });

    it('loads existing annotations on image load', async () => {
      io.files.set('/labels/a.txt', '0 0.5 0.5 0 0 0.5 0.5');
      const session = createSession({ saveDirectory: '/labels' });

      await session.loadImage(image);

      const [skeleton] = session.getState().skeletons;
      expect(skeleton.id).toBe(1);
      expect(skeleton.variant).toBe(SkeletonVariant.Lmg);
      expect(skeleton.keypoints['butt']).toEqual({ x: 320, y: 240 });
      expect(skeleton.keypoints['cover']).toBeUndefined();
      expect(session.getState().canUndo).toBe(false);
    });

    it('reports skipped lines while loading', async () => {
      io.files.set('/labels/a.txt', 'bad\n0 0.5 0.5 0 0 0.5 0.5');
      const session = createSession({ saveDirectory: '/labels' });

      await session.loadImage(image);

      expect(session.getState().skeletons).toHaveLength(1);
      expect(notices).toEqual([
        {
          type: 'MALFORMED_LINE',
          level: 'warning',
          message: 'Skipped 1 malformed line(s) in /labels/a.txt',
        },
      ]);
    });

    it('deletes the label file on reset when auto-save is on', async () => {
      io.files.set('/labels/a.txt', '0 0.5 0.5 0 0 0.5 0.5');
      const session = createSession({ saveDirectory: '/labels', autoSave: true });
      await session.loadImage(image);

      await session.resetAll();

      expect(io.files.has('/labels/a.txt')).toBe(false);
      session.undo();
      expect(session.getState().skeletons).toHaveLength(1);
    });

    it('turns I/O failures into notices and keeps the in-memory state', async () => {
      io = new FailingPersistence();
      const session = createSession({ saveDirectory: '/labels' });

      await session.loadImage(image);
      session.addSkeleton(SkeletonVariant.Lmg);
      const outcome = await session.save();

      const failures = notices.filter((n) => n.type === 'IO_FAILURE');
      expect(outcome).toBeNull();
      expect(failures).toHaveLength(2);
      expect(failures[1]).toEqual({
        type: 'IO_FAILURE',
        level: 'error',
        message: 'I/O failure on /labels/a.txt: EACCES: permission denied',
      });
      expect(session.getState().skeletons).toHaveLength(1);
    });
  });

  describe('pending label loads', () => {
    const lmgLine = '0 0.5 0.5 0 0 0.5 0.5';
    const rifleLine = '1 0.5 0.5 0 0 0.5 0.5';

    let deferred: DeferredPersistence;

    beforeEach(() => {
      deferred = new DeferredPersistence();
      io = deferred;
    });

    it('rejects edits until the label file has loaded', async () => {
      deferred.files.set('/labels/a.txt', lmgLine);
      const session = createSession({ saveDirectory: '/labels' });

      const loading = session.loadImage(image);
      await vi.waitFor(() => expect(deferred.pendingPaths).toEqual(['/labels/a.txt']));

      expect(session.addSkeleton(SkeletonVariant.Rifle)).toBeNull();
      expect(session.getState().image).toBeNull();

      deferred.release('/labels/a.txt');
      await loading;
      session.undo();

      expect(session.getState().skeletons.map((s) => [s.id, s.variant])).toEqual([
        [1, SkeletonVariant.Lmg],
      ]);
      expect(notices.map((n) => n.type)).toEqual(['NO_IMAGE', 'EMPTY_HISTORY']);
    });

    it('discards a label file that finishes after a newer image was opened', async () => {
      deferred.files.set('/labels/a.txt', lmgLine);
      deferred.files.set('/labels/b.txt', rifleLine);
      const session = createSession({ saveDirectory: '/labels' });

      const first = session.loadImage(image);
      await vi.waitFor(() => expect(deferred.pendingPaths).toEqual(['/labels/a.txt']));
      const second = session.loadImage({ name: 'b.png', width: 640, height: 480 });
      await vi.waitFor(() =>
        expect(deferred.pendingPaths).toEqual(['/labels/a.txt', '/labels/b.txt'])
      );

      deferred.release('/labels/b.txt');
      await second;
      deferred.release('/labels/a.txt');
      await first;

      const state = session.getState();
      expect(state.image?.name).toBe('b.png');
      expect(state.skeletons.map((s) => s.variant)).toEqual([SkeletonVariant.Rifle]);
    });
  });

  describe('image navigation', () => {
    it('wraps around in both directions', async () => {
      const session = createSession();
      await session.openImages(listProvider(['a.png', 'b.png', 'c.png']));
      expect(session.getState()).toMatchObject({ imageIndex: 0, imageCount: 3 });

      await session.previousImage();
      expect(session.getState().image?.name).toBe('c.png');

      await session.nextImage();
      expect(session.getState()).toMatchObject({ imageIndex: 0, image: { name: 'a.png' } });
    });

    it('auto-saves before switching and reloads on return', async () => {
      const session = createSession({ saveDirectory: '/labels', autoSave: true });
      await session.openImages(listProvider(['a.png', 'b.png']));
      session.addSkeleton(SkeletonVariant.Rifle);

      await session.nextImage();

      expect(io.files.has('/labels/a.txt')).toBe(true);
      expect(session.getState()).toMatchObject({ image: { name: 'b.png' }, skeletons: [] });

      await session.previousImage();
      expect(session.getState().skeletons).toHaveLength(1);
      expect(session.getState().canUndo).toBe(false);
    });

    it('reports an empty image list', async () => {
      const session = createSession();

      await session.openImages(listProvider([]));

      expect(session.getState().image).toBeNull();
      expect(notices).toEqual([{ type: 'NO_IMAGES', level: 'warning', message: 'No images to load.' }]);
    });

    it('cannot navigate an image loaded outside a list', async () => {
      const session = createSession();
      await session.loadImage(image);

      await session.nextImage();

      expect(session.getState().image?.name).toBe('frames/a.png');
      expect(notices.map((n) => n.type)).toEqual(['NO_IMAGES']);
    });
  });

  describe('keyboard', () => {
    it('dispatches bound keys', async () => {
      const session = createSession();
      await session.loadImage(image);

      expect(await session.handleKey({ key: '2' })).toBe(true);
      expect(await session.handleKey({ key: 'q' })).toBe(false);

      expect(session.getState().skeletons.map((s) => s.variant)).toEqual([SkeletonVariant.Rifle]);
    });

    it('toggles auto-save', async () => {
      const session = createSession();

      await session.keyAction('toggleAutoSave');

      expect(session.getState().autoSave).toBe(true);
      expect(notices).toEqual([
        { type: 'AUTO_SAVE_CHANGED', level: 'info', message: 'Auto Save Enabled' },
      ]);
    });
  });

  it('publishes state changes', async () => {
    const onChange = vi.fn<(state: SessionState) => void>();
    const session = createSession({ onChange });

    await session.loadImage(image);
    session.addSkeleton(SkeletonVariant.Lmg);

    expect(onChange.mock.lastCall?.[0]).toMatchObject({
      image: { name: 'frames/a.png' },
      selectedSkeletonId: 1,
      canUndo: true,
    });
  });

  it('exposes variant definitions for legends', () => {
    const session = createSession();

    expect(session.getVariantDefinitions().map((t) => t.label)).toEqual(['LMG', 'Rifle']);
  });
});
