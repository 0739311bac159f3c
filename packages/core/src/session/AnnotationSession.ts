/**
 * Annotation Session
 *
 * 한 명의 작업자가 이미지 목록을 순회하며 스켈레톤을 편집하는 세션
 *
 * 책임:
 * - 이미지 로드/전환 (전환 시 저장소, 히스토리, 뷰, 선택 초기화)
 * - 포인터/휠/키 입력 → 저장소 편집 + 히스토리 기록
 * - 라벨 파일 저장/로드 (자동 저장 포함)
 * - 에러 → 알림 변환 (어떤 에러도 세션을 중단시키지 않음)
 *
 * 이미지마다 새 AnnotationStore/EditHistory를 만들므로
 * 이전 이미지의 기록은 새 이미지에 영향을 주지 않음
 */

import type { Point } from '../types';
import { ViewTransform, truncatePoint } from '../coordinates';
import { HitTester, type KeypointHit } from '../interaction';
import { AnnotationStore, EditHistory } from '../annotations';
import { isAnnotationError, type AnnotationError } from '../errors';
import {
  AnnotationFileStore,
  createNodePersistence,
  type PersistenceIO,
  type SaveOutcome,
} from '../persistence';
import {
  SKELETON_VARIANTS,
  SkeletonVariant,
  getTopology,
  type PartName,
  type Skeleton,
  type SkeletonTopology,
} from '../skeleton';
import { resolveKeyAction } from './keyBindings';
import {
  DEFAULT_SESSION_CONFIG,
  type AnnotationSessionOptions,
  type ImageInfo,
  type ImageProvider,
  type KeyAction,
  type KeyInput,
  type PointerModifiers,
  type SessionConfig,
  type SessionNotice,
  type SessionNoticeLevel,
  type SessionNoticeType,
  type SessionState,
} from './types';

/**
 * 진행 중인 포인터 제스처
 */
type PointerGesture =
  | { kind: 'pan'; last: Point }
  | { kind: 'drag'; skeletonId: number; part: PartName };

/**
 * 이미지 단위 상태
 */
interface ImageContext {
  image: ImageInfo;
  store: AnnotationStore;
  history: EditHistory;
}

export class AnnotationSession {
  private readonly config: Required<SessionConfig>;
  private readonly persistence: PersistenceIO;
  private fileStore: AnnotationFileStore | null = null;

  private readonly view: ViewTransform;
  private readonly hitTester: HitTester;

  private context: ImageContext | null = null;
  private provider: ImageProvider | null = null;
  private imageIndex: number | null = null;

  private selectedSkeletonId: number | null = null;
  private selectedPart: PartName | null = null;
  private gesture: PointerGesture | null = null;

  /** 늦게 끝난 라벨 파일 로드를 무시하기 위한 토큰 */
  private loadToken = 0;

  private onChange?: (state: SessionState) => void;
  private onNotice?: (notice: SessionNotice) => void;

  constructor(options: AnnotationSessionOptions = {}) {
    const { persistence, onChange, onNotice, ...config } = options;

    this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
    this.persistence = persistence ?? createNodePersistence();
    this.onChange = onChange;
    this.onNotice = onNotice;

    this.view = new ViewTransform({
      zoomStep: this.config.zoomStep,
      minZoom: this.config.minZoom,
    });
    this.hitTester = new HitTester(this.view);
    this.fileStore = this.createFileStore(this.config.saveDirectory);
  }

  // ===========================================================================
  // 설정
  // ===========================================================================

  /**
   * 라벨 파일 폴더 설정 (null: 저장 안 함)
   */
  setSaveDirectory(directory: string | null): void {
    this.config.saveDirectory = directory;
    this.fileStore = this.createFileStore(directory);
    this.emitChange();
  }

  setAutoSave(enabled: boolean): void {
    this.config.autoSave = enabled;
    this.notify(
      'AUTO_SAVE_CHANGED',
      'info',
      enabled ? 'Auto Save Enabled' : 'Auto Save Disabled'
    );
    this.emitChange();
  }

  toggleAutoSave(): void {
    this.setAutoSave(!this.config.autoSave);
  }

  // ===========================================================================
  // 이미지
  // ===========================================================================

  /**
   * 이미지 목록 열기 (첫 이미지 로드)
   */
  async openImages(provider: ImageProvider): Promise<void> {
    this.provider = provider;
    this.imageIndex = null;

    if (provider.count === 0) {
      this.notify('NO_IMAGES', 'warning', 'No images to load.');
      this.emitChange();
      return;
    }

    await this.loadImageAt(0);
  }

  /**
   * 목록과 관계없이 이미지 하나 로드
   */
  async loadImage(image: ImageInfo): Promise<void> {
    await this.activate(() => image, null);
  }

  async nextImage(): Promise<void> {
    await this.stepImage(1);
  }

  async previousImage(): Promise<void> {
    await this.stepImage(-1);
  }

  // ===========================================================================
  // 편집
  // ===========================================================================

  /**
   * 이미지 중앙에 기본 모양의 스켈레톤 추가
   *
   * @returns 추가된 스켈레톤, 이미지가 없으면 null
   */
  addSkeleton(variant: SkeletonVariant): Readonly<Skeleton> | null {
    const context = this.requireContext();
    if (!context) return null;

    const { width, height } = context.image;
    const anchor = { x: Math.floor(width / 2), y: Math.floor(height / 2) };

    const skeleton = context.store.addSkeleton(variant, anchor);
    context.history.record({ kind: 'addSkeleton', skeleton });

    this.selectedSkeletonId = skeleton.id;
    this.selectedPart = null;

    this.notify('SKELETON_ADDED', 'info', `Selected ${getTopology(variant).label} Skeleton.`);
    this.emitChange();
    return skeleton;
  }

  /**
   * 선택된 키포인트 삭제 (선택이 없으면 무시)
   */
  deleteSelectedKeypoint(): void {
    const context = this.requireContext();
    if (!context) return;

    const skeletonId = this.selectedSkeletonId;
    const part = this.selectedPart;
    if (skeletonId === null || part === null) {
      return;
    }

    try {
      const oldPosition = context.store.deleteKeypoint(skeletonId, part);
      context.history.record({ kind: 'deleteKeypoint', skeletonId, part, oldPosition });
      console.log(`[AnnotationSession] Keypoint '${part}' deleted from Skeleton ${skeletonId}.`);
    } catch (error) {
      this.report(error);
    }

    this.selectedPart = null;
    this.emitChange();
  }

  /**
   * 전체 초기화
   *
   * 자동 저장이 켜져 있으면 라벨 파일도 삭제
   */
  async resetAll(): Promise<void> {
    const context = this.requireContext();
    if (!context) return;

    const previous = context.store.snapshot();
    context.store.resetAll();
    context.history.record({ kind: 'resetAll', previous });
    this.clearSelection();
    this.emitChange();

    if (this.config.autoSave && this.fileStore) {
      try {
        await this.fileStore.remove(context.image.name);
      } catch (error) {
        this.report(error);
      }
    }
  }

  undo(): void {
    const context = this.requireContext();
    if (!context) return;

    try {
      context.history.undo();
    } catch (error) {
      this.report(error);
    }

    this.pruneSelection(context);
    this.emitChange();
  }

  redo(): void {
    const context = this.requireContext();
    if (!context) return;

    try {
      context.history.redo();
    } catch (error) {
      this.report(error);
    }

    this.pruneSelection(context);
    this.emitChange();
  }

  /**
   * 라벨 파일 저장
   *
   * @returns 저장 결과, 저장하지 못했으면 null
   */
  async save(): Promise<SaveOutcome | null> {
    const context = this.requireContext();
    if (!context) return null;

    if (!this.fileStore) {
      this.notify('NO_SAVE_DIRECTORY', 'warning', 'No Save Folder Selected');
      return null;
    }

    try {
      const { image, store } = context;
      const outcome = await this.fileStore.save(image.name, store.snapshot(), image);

      if (outcome === 'written') {
        this.notify('SAVED', 'info', 'Annotations saved.');
      } else {
        console.log(`[AnnotationSession] No annotations to save for ${image.name}.`);
      }
      return outcome;
    } catch (error) {
      this.report(error);
      return null;
    }
  }

  // ===========================================================================
  // 포인터 / 휠
  // ===========================================================================

  /**
   * 포인터 누름
   *
   * - Ctrl: 팬 시작
   * - 그 외: 히트 테스트 후 키포인트 드래그 시작 (빗나가면 선택 유지)
   *
   * @returns 히트한 키포인트
   */
  pointerDown(viewPoint: Point, modifiers: PointerModifiers = {}): KeypointHit | null {
    const context = this.requireContext();
    if (!context) return null;

    if (modifiers.ctrlKey) {
      this.gesture = { kind: 'pan', last: { ...viewPoint } };
      return null;
    }

    const hit = this.hitTester.find(
      viewPoint,
      context.store.snapshot(),
      this.config.hitTolerance
    );
    if (!hit) {
      return null;
    }

    this.selectedSkeletonId = hit.skeletonId;
    this.selectedPart = hit.part;
    this.gesture = { kind: 'drag', skeletonId: hit.skeletonId, part: hit.part };
    this.emitChange();
    return hit;
  }

  /**
   * 포인터 이동
   *
   * 드래그 중이면 이동 한 번이 히스토리 기록 하나
   */
  pointerMove(viewPoint: Point): void {
    const context = this.context;
    const gesture = this.gesture;
    if (!context || !gesture) return;

    if (gesture.kind === 'pan') {
      this.view.panBy(viewPoint.x - gesture.last.x, viewPoint.y - gesture.last.y);
      this.gesture = { kind: 'pan', last: { ...viewPoint } };
      this.emitChange();
      return;
    }

    const { skeletonId, part } = gesture;
    const imagePoint = truncatePoint(this.view.toImageSpace(viewPoint));

    try {
      const { oldPosition, newPosition } = context.store.moveKeypoint(skeletonId, part, imagePoint);
      context.history.record({ kind: 'moveKeypoint', skeletonId, part, oldPosition, newPosition });
    } catch (error) {
      this.gesture = null;
      this.report(error);
    }

    this.emitChange();
  }

  pointerUp(): void {
    this.gesture = null;
  }

  /**
   * 휠 줌 (deltaY < 0: 확대, 그 외: 축소)
   */
  wheel(deltaY: number): void {
    if (!this.requireContext()) return;

    if (deltaY < 0) {
      this.view.zoomIn();
    } else {
      this.view.zoomOut();
    }
    this.emitChange();
  }

  // ===========================================================================
  // 키보드
  // ===========================================================================

  /**
   * 동작 실행
   */
  async keyAction(action: KeyAction): Promise<void> {
    switch (action) {
      case 'addLmg':
        this.addSkeleton(SkeletonVariant.Lmg);
        break;
      case 'addRifle':
        this.addSkeleton(SkeletonVariant.Rifle);
        break;
      case 'undo':
        this.undo();
        break;
      case 'redo':
        this.redo();
        break;
      case 'reset':
        await this.resetAll();
        break;
      case 'deleteKeypoint':
        this.deleteSelectedKeypoint();
        break;
      case 'save':
        await this.save();
        break;
      case 'nextImage':
        await this.nextImage();
        break;
      case 'previousImage':
        await this.previousImage();
        break;
      case 'toggleAutoSave':
        this.toggleAutoSave();
        break;
      default:
        assertNever(action);
    }
  }

  /**
   * 키 입력 처리
   *
   * @returns 바인딩된 동작이 있었는지
   */
  async handleKey(input: KeyInput): Promise<boolean> {
    const action = resolveKeyAction(input);
    if (action === null) {
      return false;
    }
    await this.keyAction(action);
    return true;
  }

  // ===========================================================================
  // 조회
  // ===========================================================================

  getState(): SessionState {
    const context = this.context;
    const historyState = context?.history.getState();

    return {
      image: context ? { ...context.image } : null,
      imageIndex: this.imageIndex,
      imageCount: this.provider?.count ?? 0,
      skeletons: context ? context.store.snapshot() : [],
      selectedSkeletonId: this.selectedSkeletonId,
      selectedPart: this.selectedPart,
      zoom: this.view.zoom,
      zoomPercent: this.view.zoomPercent,
      pan: this.view.pan,
      autoSave: this.config.autoSave,
      saveDirectory: this.config.saveDirectory,
      canUndo: historyState?.canUndo ?? false,
      canRedo: historyState?.canRedo ?? false,
    };
  }

  /**
   * 변형별 토폴로지 (범례 표시용)
   */
  getVariantDefinitions(): SkeletonTopology[] {
    return SKELETON_VARIANTS.map(getTopology);
  }

  /**
   * 렌더링용 뷰 변환
   */
  getViewTransform(): ViewTransform {
    return new ViewTransform({ zoom: this.view.zoom, pan: this.view.pan });
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * 이미지 컨텍스트 교체
   *
   * 라벨 파일까지 읽은 뒤에 컨텍스트를 공개
   * 로드 중에는 이미지가 없는 상태 (편집 명령은 NO_IMAGE)
   */
  private async activate(
    resolveImage: () => ImageInfo | Promise<ImageInfo>,
    index: number | null
  ): Promise<void> {
    const token = ++this.loadToken;
    this.context = null;
    this.imageIndex = null;
    this.clearSelection();
    this.gesture = null;
    this.emitChange();

    const image = { ...(await resolveImage()) };
    if (token !== this.loadToken) {
      return;
    }

    const size = { width: image.width, height: image.height };
    const store = new AnnotationStore({ imageSize: size });
    const fileStore = this.fileStore;

    if (fileStore) {
      try {
        const result = await fileStore.load(image.name, size, {
          missingKeypoints: this.config.missingKeypoints,
        });

        // 로드 중에 다른 이미지로 전환됨
        if (token !== this.loadToken) {
          return;
        }

        if (result) {
          store.replaceAll(result.skeletons);
          if (result.skippedCount > 0) {
            this.notify(
              'MALFORMED_LINE',
              'warning',
              `Skipped ${result.skippedCount} malformed line(s) in ${fileStore.labelPathFor(image.name)}`
            );
          }
        }
      } catch (error) {
        if (token !== this.loadToken) {
          return;
        }
        this.report(error);
      }
    }

    const history = new EditHistory(store, { maxSize: this.config.maxHistorySize });
    this.context = { image, store, history };
    this.imageIndex = index;
    this.view.reset();

    console.log(`[AnnotationSession] Annotating: ${image.name}`);
    this.emitChange();
  }

  private async loadImageAt(index: number): Promise<void> {
    const provider = this.provider;
    if (!provider) return;

    await this.activate(() => provider.getImage(index), index);
  }

  private createFileStore(directory: string | null): AnnotationFileStore | null {
    return directory !== null ? new AnnotationFileStore(this.persistence, directory) : null;
  }

  /**
   * 이미지 이동 (양 끝에서 순환)
   */
  private async stepImage(step: 1 | -1): Promise<void> {
    if (!this.requireContext()) return;

    const provider = this.provider;
    if (!provider || provider.count === 0) {
      this.notify('NO_IMAGES', 'warning', 'No images to load.');
      return;
    }

    if (this.config.autoSave) {
      await this.save();
    }

    const current = this.imageIndex ?? 0;
    const next = (current + step + provider.count) % provider.count;
    await this.loadImageAt(next);
  }

  /**
   * 이미지 컨텍스트 확인 (없으면 NO_IMAGE 알림)
   */
  private requireContext(): ImageContext | null {
    if (!this.context) {
      this.notify('NO_IMAGE', 'warning', 'No Image Loaded');
      return null;
    }
    return this.context;
  }

  private clearSelection(): void {
    this.selectedSkeletonId = null;
    this.selectedPart = null;
  }

  /**
   * Undo/Redo로 사라진 스켈레톤의 선택 해제
   */
  private pruneSelection(context: ImageContext): void {
    if (this.selectedSkeletonId !== null && !context.store.has(this.selectedSkeletonId)) {
      this.clearSelection();
    }
  }

  /**
   * AnnotationError → 알림, 그 외 에러는 그대로 전파
   */
  private report(error: unknown): void {
    if (!isAnnotationError(error)) {
      throw error;
    }

    if (error.type === 'INVALID_PART') {
      console.error(`[AnnotationSession] ${error.message}`);
    }

    this.notify(error.type, levelOf(error), error.message);
  }

  private notify(type: SessionNoticeType, level: SessionNoticeLevel, message: string): void {
    if (this.onNotice) {
      this.onNotice({ type, level, message });
    }
  }

  private emitChange(): void {
    if (this.onChange) {
      this.onChange(this.getState());
    }
  }
}

function levelOf(error: AnnotationError): SessionNoticeLevel {
  switch (error.type) {
    case 'EMPTY_HISTORY':
      return 'info';
    case 'NOT_FOUND':
    case 'MALFORMED_LINE':
      return 'warning';
    case 'INVALID_PART':
    case 'IO_FAILURE':
      return 'error';
  }
}

function assertNever(action: never): never {
  throw new Error(`[AnnotationSession] Unknown key action: ${String(action)}`);
}
