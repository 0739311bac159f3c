/**
 * useAnnotationSession - 어노테이션 세션 훅
 *
 * 컴포넌트마다 AnnotationSession 하나를 만들고 상태를 React state로 미러링
 *
 * 학습 포인트:
 * - 세션은 ref에 한 번만 생성 (옵션 변경은 마운트 이후 반영되지 않음)
 * - onChange → setState, onNotice → 알림 목록
 * - 포인터/휠/키 이벤트 핸들러는 컨테이너 요소에 그대로 전달
 */

import { useCallback, useMemo, useRef, useState } from 'react';
import type {
  KeyboardEvent as ReactKeyboardEvent,
  PointerEvent as ReactPointerEvent,
  WheelEvent as ReactWheelEvent,
} from 'react';
import {
  AnnotationSession,
  ViewTransform,
  resolveKeyAction,
  type AnnotationSessionOptions,
  type Point,
  type SessionNotice,
  type SessionState,
} from '@keymark/core';

/**
 * useAnnotationSession 옵션
 */
export interface UseAnnotationSessionOptions extends Omit<AnnotationSessionOptions, 'onChange'> {
  /** 보관할 최근 알림 수 (기본: 5) */
  maxNotices?: number;
}

/**
 * 컨테이너 요소 이벤트 핸들러
 */
export interface AnnotationSessionHandlers {
  onPointerDown: (e: ReactPointerEvent<Element>) => void;
  onPointerMove: (e: ReactPointerEvent<Element>) => void;
  onPointerUp: (e: ReactPointerEvent<Element>) => void;
  onWheel: (e: ReactWheelEvent<Element>) => void;
  onKeyDown: (e: ReactKeyboardEvent<Element>) => void;
}

/**
 * useAnnotationSession 반환 타입
 */
export interface UseAnnotationSessionReturn {
  session: AnnotationSession;
  state: SessionState;
  /** 렌더링용 좌표 변환 (state.zoom/pan 기준) */
  transform: ViewTransform;
  /** 최근 알림 (오래된 순) */
  notices: SessionNotice[];
  clearNotices: () => void;
  handlers: AnnotationSessionHandlers;
}

const DEFAULT_MAX_NOTICES = 5;

/**
 * 컨테이너 기준 포인터 위치 (뷰 좌표)
 */
function toViewPoint(e: { clientX: number; clientY: number; currentTarget: Element }): Point {
  const rect = e.currentTarget.getBoundingClientRect();
  return { x: e.clientX - rect.left, y: e.clientY - rect.top };
}

/**
 * 어노테이션 세션 훅
 *
 * @example
 * ```tsx
 * const { session, state, transform, handlers } = useAnnotationSession({
 *   saveDirectory: '/data/labels',
 *   autoSave: true,
 * });
 *
 * useEffect(() => {
 *   session.openImages(provider).catch(console.error);
 * }, [session, provider]);
 *
 * return (
 *   <div tabIndex={0} {...handlers}>
 *     <SkeletonOverlay skeletons={state.skeletons} transform={transform} />
 *   </div>
 * );
 * ```
 */
export function useAnnotationSession(
  options: UseAnnotationSessionOptions = {}
): UseAnnotationSessionReturn {
  const { maxNotices = DEFAULT_MAX_NOTICES, onNotice, ...sessionOptions } = options;

  const [notices, setNotices] = useState<SessionNotice[]>([]);

  // 최신 콜백 유지 (세션은 한 번만 생성)
  const onNoticeRef = useRef(onNotice);
  onNoticeRef.current = onNotice;
  const maxNoticesRef = useRef(maxNotices);
  maxNoticesRef.current = maxNotices;

  const sessionRef = useRef<AnnotationSession | null>(null);
  if (sessionRef.current === null) {
    sessionRef.current = new AnnotationSession({
      ...sessionOptions,
      onChange: (next) => setState(next),
      onNotice: (notice) => {
        setNotices((prev) => [...prev, notice].slice(-maxNoticesRef.current));
        onNoticeRef.current?.(notice);
      },
    });
  }
  const session = sessionRef.current;

  const [state, setState] = useState<SessionState>(() => session.getState());

  // pan 객체는 emit마다 새로 생성됨
  const { zoom, pan: { x: panX, y: panY } } = state;
  const transform = useMemo(
    () => new ViewTransform({ zoom, pan: { x: panX, y: panY } }),
    [zoom, panX, panY]
  );

  const clearNotices = useCallback(() => setNotices([]), []);

  // ---------------------------------------------------------------------------
  // 이벤트 핸들러
  // ---------------------------------------------------------------------------

  const onPointerDown = useCallback(
    (e: ReactPointerEvent<Element>) => {
      session.pointerDown(toViewPoint(e), { ctrlKey: e.ctrlKey });
    },
    [session]
  );

  const onPointerMove = useCallback(
    (e: ReactPointerEvent<Element>) => {
      session.pointerMove(toViewPoint(e));
    },
    [session]
  );

  const onPointerUp = useCallback(() => {
    session.pointerUp();
  }, [session]);

  const onWheel = useCallback(
    (e: ReactWheelEvent<Element>) => {
      session.wheel(e.deltaY);
    },
    [session]
  );

  const onKeyDown = useCallback(
    (e: ReactKeyboardEvent<Element>) => {
      const action = resolveKeyAction(e);
      if (action === null) return;

      // Ctrl+S 등 브라우저 기본 동작 방지
      e.preventDefault();
      session.keyAction(action).catch((error: unknown) => {
        console.error(`[useAnnotationSession] Key action "${action}" failed:`, error);
      });
    },
    [session]
  );

  const handlers = useMemo(
    () => ({ onPointerDown, onPointerMove, onPointerUp, onWheel, onKeyDown }),
    [onPointerDown, onPointerMove, onPointerUp, onWheel, onKeyDown]
  );

  return { session, state, transform, notices, clearNotices, handlers };
}
