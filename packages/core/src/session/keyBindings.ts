/**
 * 키 바인딩
 *
 * 키 입력 → KeyAction 매핑을 한 곳에서 관리
 *
 * | 키 | 수정자 | 동작 |
 * |----|--------|------|
 * | Delete | 없음 | deleteKeypoint |
 * | a | 없음 | previousImage |
 * | d | 없음 | nextImage |
 * | r | 없음 | reset |
 * | 1 | 없음 | addLmg |
 * | 2 | 없음 | addRifle |
 * | z | Ctrl | undo |
 * | y | Ctrl | redo |
 * | s | Ctrl | save |
 * | a | Ctrl | toggleAutoSave |
 */

import type { KeyAction, KeyInput } from './types';

/**
 * 키보드 수정자
 *
 * 비트 플래그 형식으로 조합 가능
 */
export enum KeyboardModifiers {
  None = 0,
  Shift = 1,
  Ctrl = 2,
  Alt = 4,
}

/**
 * 키 바인딩 정의
 */
export interface KeyBinding {
  /** KeyboardEvent.key (소문자) */
  key: string;
  /** 정확히 일치해야 하는 수정자 조합 */
  modifiers: KeyboardModifiers;
  action: KeyAction;
}

export const DEFAULT_KEY_BINDINGS: readonly KeyBinding[] = [
  { key: 'delete', modifiers: KeyboardModifiers.None, action: 'deleteKeypoint' },
  { key: 'a', modifiers: KeyboardModifiers.None, action: 'previousImage' },
  { key: 'd', modifiers: KeyboardModifiers.None, action: 'nextImage' },
  { key: 'r', modifiers: KeyboardModifiers.None, action: 'reset' },
  { key: '1', modifiers: KeyboardModifiers.None, action: 'addLmg' },
  { key: '2', modifiers: KeyboardModifiers.None, action: 'addRifle' },
  { key: 'z', modifiers: KeyboardModifiers.Ctrl, action: 'undo' },
  { key: 'y', modifiers: KeyboardModifiers.Ctrl, action: 'redo' },
  { key: 's', modifiers: KeyboardModifiers.Ctrl, action: 'save' },
  { key: 'a', modifiers: KeyboardModifiers.Ctrl, action: 'toggleAutoSave' },
];

/**
 * 키 입력의 수정자 플래그
 *
 * macOS의 Cmd(meta)는 Ctrl로 취급
 */
export function getModifiers(input: KeyInput): KeyboardModifiers {
  let modifiers = KeyboardModifiers.None;
  if (input.shiftKey) modifiers |= KeyboardModifiers.Shift;
  if (input.ctrlKey || input.metaKey) modifiers |= KeyboardModifiers.Ctrl;
  if (input.altKey) modifiers |= KeyboardModifiers.Alt;
  return modifiers;
}

/**
 * 키 입력 → 동작
 *
 * @example
 * resolveKeyAction({ key: 'z', ctrlKey: true }) // 'undo'
 * resolveKeyAction({ key: 'z' }) // null
 */
export function resolveKeyAction(
  input: KeyInput,
  bindings: readonly KeyBinding[] = DEFAULT_KEY_BINDINGS
): KeyAction | null {
  const key = input.key.toLowerCase();
  const modifiers = getModifiers(input);

  const binding = bindings.find((b) => b.key === key && b.modifiers === modifiers);
  return binding ? binding.action : null;
}
