import { OutOfRangeError, PropertyMismatchError, assertUnreachable } from '@/utils/errors';
import { DragLock } from './dragLock';
import { DRAGLOCK_MAX_BUTTONS } from './types';

export const DRAG_LOCK_PROPERTY_NAME = 'libinput Drag Lock Buttons';

export interface DragLockPropertyOptions {
  /** Validate only; the drag lock is left untouched. */
  checkOnly?: boolean;
}

/**
 * Property value for the current configuration: empty when disabled,
 * `[meta]` in meta mode, `[button, target, ...]` in pairs mode. Built from
 * the active mapping, so a meta button left over from an earlier
 * configuration never shows up here (unlike `DragLock.getPairs()`).
 */
export function encodeDragLockProperty(dragLock: DragLock): number[] {
  const mode = dragLock.mode;
  switch (mode.kind) {
    case 'disabled':
      return [];
    case 'meta':
      return [mode.metaButton];
    case 'pairs': {
      const values: number[] = [];
      mode.mapping.forEach((target, button) => {
        if (target !== 0) values.push(button, target);
      });
      return values;
    }
    default:
      return assertUnreachable(mode, 'drag lock mode');
  }
}

/**
 * Apply a property write: a single value (or none) sets the meta button,
 * an even number of values sets button/target pairs.
 *
 * @throws PropertyMismatchError when the value has the wrong shape
 * @throws OutOfRangeError when a button is out of range
 */
export function applyDragLockProperty(
  dragLock: DragLock,
  values: readonly number[],
  options: DragLockPropertyOptions = {}
): void {
  if (values.length > 1 && values.length % 2 !== 0) {
    throw new PropertyMismatchError(`Drag lock property needs pairs, got ${values.length} values`);
  }

  const target = options.checkOnly ? new DragLock() : dragLock;

  if (values.length <= 1) {
    target.setMeta(values[0] ?? 0);
    return;
  }

  if (values.length > DRAGLOCK_MAX_BUTTONS) {
    throw new PropertyMismatchError(
      `Drag lock property takes at most ${DRAGLOCK_MAX_BUTTONS} values, got ${values.length}`
    );
  }

  let highest = 0;
  for (let i = 0; i < values.length; i += 2) {
    const button = values[i] ?? 0;
    if (!Number.isInteger(button) || button < 0 || button >= DRAGLOCK_MAX_BUTTONS) {
      throw new OutOfRangeError(`Drag lock button ${button} out of range`);
    }
    highest = Math.max(highest, button);
  }

  const mapping = new Array<number>(highest + 1).fill(0);
  for (let i = 0; i < values.length; i += 2) {
    mapping[values[i] ?? 0] = values[i + 1] ?? 0;
  }
  target.setPairs(mapping);
}
