import { OutOfRangeError, assertUnreachable } from '@/utils/errors';
import { parseDragLockConfig } from './parseDragLockConfig';
import {
  DRAGLOCK_MAX_BUTTONS,
  type ButtonEvent,
  type DragLockButtonState,
  type DragLockMode,
} from './types';

function isValidButtonNumber(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < DRAGLOCK_MAX_BUTTONS;
}

/**
 * Per-device drag-lock filter.
 *
 * Meta mode: clicking the meta button and then button B keeps B logically
 * held until B is clicked again. Pairs mode: the first click of a mapped
 * button presses its target, the second click releases it.
 */
export class DragLock {
  private currentMode: DragLockMode = { kind: 'disabled' };
  // Kept across setPairs() so getPairs() can report it, see getPairs().
  private metaButton = 0;
  private metaArmed = false;
  // Slot 0 is never used; button 0 is filtered out before any lookup.
  private readonly lockState: DragLockButtonState[] = new Array<DragLockButtonState>(
    DRAGLOCK_MAX_BUTTONS
  ).fill('none');

  static fromString(config?: string | null): DragLock {
    const dragLock = new DragLock();
    dragLock.initFromString(config);
    return dragLock;
  }

  get mode(): DragLockMode {
    const mode = this.currentMode;
    if (mode.kind === 'pairs') {
      return { kind: 'pairs', mapping: [...mode.mapping] };
    }
    return { ...mode };
  }

  /**
   * Reset all state and configure from a DragLockButtons string.
   * @throws InvalidConfigError, after resetting to disabled
   */
  initFromString(config?: string | null): void {
    this.currentMode = { kind: 'disabled' };
    this.metaButton = 0;
    this.reset();

    const parsed = parseDragLockConfig(config);
    switch (parsed.kind) {
      case 'disabled':
        return;
      case 'meta':
        this.setMeta(parsed.metaButton);
        return;
      case 'pairs':
        this.setPairs(parsed.mapping);
        return;
      default:
        assertUnreachable(parsed, 'parsed drag lock config');
    }
  }

  /** Clear per-button lock state and the meta arm flag; the mode is kept. */
  reset(): void {
    this.metaArmed = false;
    this.lockState.fill('none');
  }

  getMeta(): number {
    return this.currentMode.kind === 'meta' ? this.currentMode.metaButton : 0;
  }

  /**
   * Button mapping indexed by source button, from slot 0 up to the highest
   * mapped button. Empty unless in pairs mode.
   *
   * If a meta button was configured before switching to pairs mode, the
   * result is that meta button alone. Drivers historically relied on this.
   */
  getPairs(): number[] {
    const mode = this.currentMode;
    if (mode.kind !== 'pairs') return [];

    if (this.metaButton !== 0) {
      return [this.metaButton];
    }

    let last = 0;
    for (let i = 0; i < mode.mapping.length; i += 1) {
      if ((mode.mapping[i] ?? 0) !== 0) last = i;
    }
    return mode.mapping.slice(0, last + 1);
  }

  /** @throws OutOfRangeError, leaving the current configuration in place */
  setMeta(button: number): void {
    if (!isValidButtonNumber(button)) {
      throw new OutOfRangeError(`Meta button ${button} out of range [0, ${DRAGLOCK_MAX_BUTTONS})`);
    }

    this.metaButton = button;
    this.currentMode = button === 0 ? { kind: 'disabled' } : { kind: 'meta', metaButton: button };
  }

  /**
   * `mapping[source] = target`, slot 0 must be 0.
   * @throws OutOfRangeError, leaving the current configuration in place
   */
  setPairs(mapping: readonly number[]): void {
    if (mapping.length === 0 || mapping.length > DRAGLOCK_MAX_BUTTONS) {
      throw new OutOfRangeError(
        `Drag lock mapping needs 1..${DRAGLOCK_MAX_BUTTONS} entries, got ${mapping.length}`
      );
    }
    if (mapping[0] !== 0) {
      throw new OutOfRangeError('Drag lock mapping must not map button 0');
    }
    const invalid = mapping.find((target) => !isValidButtonNumber(target));
    if (invalid !== undefined) {
      throw new OutOfRangeError(`Drag lock target ${invalid} out of range [0, ${DRAGLOCK_MAX_BUTTONS})`);
    }

    const table = new Array<number>(DRAGLOCK_MAX_BUTTONS).fill(0);
    mapping.forEach((target, source) => {
      table[source] = target;
    });
    this.currentMode = table.some((target) => target !== 0)
      ? { kind: 'pairs', mapping: table }
      : { kind: 'disabled' };
  }

  /**
   * Run one button event through the lock. A returned button of 0 means the
   * event is swallowed.
   */
  filterButton(button: number, isPress: boolean): ButtonEvent {
    if (button === 0) return { button, isPress };
    // no state slot, nothing can lock this button
    if (!Number.isInteger(button) || button < 0 || button >= DRAGLOCK_MAX_BUTTONS) {
      return { button, isPress };
    }

    const mode = this.currentMode;
    switch (mode.kind) {
      case 'disabled':
        return { button, isPress };
      case 'meta':
        return { button: this.filterMeta(mode.metaButton, button, isPress), isPress };
      case 'pairs':
        return { button: this.filterPair(mode.mapping, button, isPress), isPress };
      default:
        return assertUnreachable(mode, 'drag lock mode');
    }
  }

  private filterMeta(metaButton: number, button: number, isPress: boolean): number {
    if (button === metaButton) {
      if (isPress) this.metaArmed = true;
      return 0;
    }

    switch (this.lockState[button]) {
      case 'none':
        if (this.metaArmed && isPress) {
          this.lockState[button] = 'down1';
          this.metaArmed = false;
        }
        return button;
      case 'down1':
        if (!isPress) {
          this.lockState[button] = 'up1';
          return 0;
        }
        return button;
      case 'up1':
        if (isPress) {
          this.lockState[button] = 'down2';
          return 0;
        }
        return button;
      case 'down2':
        if (!isPress) {
          this.lockState[button] = 'none';
        }
        return button;
      default:
        throw new Error(`Invariant violated: no lock state for button ${button}`);
    }
  }

  private filterPair(mapping: readonly number[], button: number, isPress: boolean): number {
    const target = mapping[button] ?? 0;
    if (target === 0) return button;

    switch (this.lockState[button]) {
      case 'none':
        if (isPress) {
          this.lockState[button] = 'down1';
          return target;
        }
        return button;
      case 'down1':
        if (!isPress) {
          this.lockState[button] = 'up1';
          return 0;
        }
        return button;
      case 'up1':
        if (isPress) {
          this.lockState[button] = 'down2';
          return 0;
        }
        return button;
      case 'down2':
        if (!isPress) {
          this.lockState[button] = 'none';
          return target;
        }
        return button;
      default:
        throw new Error(`Invariant violated: no lock state for button ${button}`);
    }
  }
}
