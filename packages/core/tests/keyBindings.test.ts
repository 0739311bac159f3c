import { describe, it, expect } from 'vitest';
import { KeyboardModifiers, getModifiers, resolveKeyAction } from '../src/session';

describe('resolveKeyAction', () => {
  it.each([
    [{ key: 'Delete' }, 'deleteKeypoint'],
    [{ key: 'a' }, 'previousImage'],
    [{ key: 'd' }, 'nextImage'],
    [{ key: 'r' }, 'reset'],
    [{ key: '1' }, 'addLmg'],
    [{ key: '2' }, 'addRifle'],
    [{ key: 'z', ctrlKey: true }, 'undo'],
    [{ key: 'y', ctrlKey: true }, 'redo'],
    [{ key: 's', ctrlKey: true }, 'save'],
    [{ key: 'a', ctrlKey: true }, 'toggleAutoSave'],
  ])('maps %o to %s', (input, action) => {
    expect(resolveKeyAction(input)).toBe(action);
  });

  it('requires plain keys to have no modifiers', () => {
    expect(resolveKeyAction({ key: 'r', shiftKey: true })).toBeNull();
    expect(resolveKeyAction({ key: 'd', altKey: true })).toBeNull();
  });

  it('requires the Ctrl modifier for shortcuts', () => {
    expect(resolveKeyAction({ key: 'z' })).toBeNull();
    expect(resolveKeyAction({ key: 's', ctrlKey: true, shiftKey: true })).toBeNull();
  });

  it('treats Cmd as Ctrl', () => {
    expect(resolveKeyAction({ key: 'z', metaKey: true })).toBe('undo');
  });

  it('ignores key case', () => {
    expect(resolveKeyAction({ key: 'Z', ctrlKey: true })).toBe('undo');
  });

  it('returns null for unbound keys', () => {
    expect(resolveKeyAction({ key: 'q' })).toBeNull();
  });
});

describe('getModifiers', () => {
  it('combines modifier flags', () => {
    expect(getModifiers({ key: 'x', ctrlKey: true, shiftKey: true })).toBe(
      KeyboardModifiers.Ctrl | KeyboardModifiers.Shift
    );
  });
});
