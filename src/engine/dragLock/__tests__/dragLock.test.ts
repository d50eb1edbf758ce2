import { beforeEach, describe, expect, it } from 'vitest';
import { DragLock } from '../dragLock';
import { DRAGLOCK_MAX_BUTTONS } from '../types';
import { InvalidConfigError, OutOfRangeError } from '@/utils/errors';

type Step = [button: number, isPress: boolean];

function run(dragLock: DragLock, steps: Step[]): number[] {
  return steps.map(([button, isPress]) => dragLock.filterButton(button, isPress).button);
}

describe('DragLock configuration', () => {
  it('starts disabled', () => {
    const dragLock = new DragLock();
    expect(dragLock.mode).toEqual({ kind: 'disabled' });
    expect(dragLock.getMeta()).toBe(0);
    expect(dragLock.getPairs()).toEqual([]);
  });

  it('builds from a config string', () => {
    expect(DragLock.fromString(null).mode).toEqual({ kind: 'disabled' });
    expect(DragLock.fromString('').mode).toEqual({ kind: 'disabled' });
    expect(DragLock.fromString('0').mode).toEqual({ kind: 'disabled' });
    expect(DragLock.fromString('5').mode).toEqual({ kind: 'meta', metaButton: 5 });
    expect(DragLock.fromString('1 2 3 4').mode.kind).toBe('pairs');
  });

  it('resets to disabled when the config string is invalid', () => {
    const dragLock = DragLock.fromString('5');
    expect(() => dragLock.initFromString('1 ')).toThrow(InvalidConfigError);
    expect(dragLock.mode).toEqual({ kind: 'disabled' });

    expect(() => dragLock.initFromString('256')).toThrow(InvalidConfigError);
    expect(dragLock.mode).toEqual({ kind: 'disabled' });
  });

  it('reports meta and pairs for each mode', () => {
    const dragLock = DragLock.fromString('');
    expect(dragLock.getMeta()).toBe(0);
    expect(dragLock.getPairs()).toEqual([]);

    dragLock.initFromString('8');
    expect(dragLock.getMeta()).toBe(8);
    expect(dragLock.getPairs()).toEqual([]);

    dragLock.initFromString('1 2 3 4 5 6');
    expect(dragLock.getMeta()).toBe(0);
    const pairs = dragLock.getPairs();
    expect(pairs).toEqual([0, 2, 0, 4, 0, 6]);
    // highest mapped button
    expect(pairs.length - 1).toBe(5);
  });

  it('hands out a copy of the mode', () => {
    const dragLock = DragLock.fromString('1 2');
    const mode = dragLock.mode;
    if (mode.kind !== 'pairs') throw new Error('expected pairs mode');
    expect(mode.mapping[1]).toBe(2);
    expect(mode.mapping).toHaveLength(DRAGLOCK_MAX_BUTTONS);
  });
});

describe('DragLock setters', () => {
  it('sets and clears the meta button', () => {
    const dragLock = new DragLock();
    dragLock.setMeta(0);
    expect(dragLock.mode).toEqual({ kind: 'disabled' });

    dragLock.setMeta(1);
    expect(dragLock.mode).toEqual({ kind: 'meta', metaButton: 1 });
    expect(dragLock.getMeta()).toBe(1);

    dragLock.setMeta(12);
    expect(dragLock.getMeta()).toBe(12);
  });

  it.each([-1, 32, 255, 1.5])('rejects meta button %s and keeps the current mode', (button) => {
    const dragLock = DragLock.fromString('3');
    expect(() => dragLock.setMeta(button)).toThrow(OutOfRangeError);
    expect(dragLock.mode).toEqual({ kind: 'meta', metaButton: 3 });
  });

  it('switches between disabled and pairs based on the mapping', () => {
    const dragLock = DragLock.fromString('');
    dragLock.setPairs(new Array<number>(32).fill(0));
    expect(dragLock.mode).toEqual({ kind: 'disabled' });

    dragLock.setPairs([0]);
    expect(dragLock.mode).toEqual({ kind: 'disabled' });

    dragLock.setPairs([0, 2]);
    expect(dragLock.mode.kind).toBe('pairs');

    const mapping = new Array<number>(32).fill(0);
    mapping[10] = 8;
    dragLock.setPairs(mapping);
    expect(dragLock.mode.kind).toBe('pairs');
    expect(dragLock.getPairs()).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 8]);
  });

  it('round-trips the non-zero prefix of a mapping', () => {
    const dragLock = new DragLock();
    dragLock.setPairs([0, 2, 0, 4, 0, 0]);
    expect(dragLock.getPairs()).toEqual([0, 2, 0, 4]);
  });

  it('rejects invalid mappings and keeps the current mode', () => {
    const dragLock = DragLock.fromString('1 2');
    const before = dragLock.getPairs();

    expect(() => dragLock.setPairs([1])).toThrow(OutOfRangeError);
    expect(() => dragLock.setPairs([])).toThrow(OutOfRangeError);
    expect(() => dragLock.setPairs([0, 32])).toThrow(OutOfRangeError);
    expect(() => dragLock.setPairs([0, -1])).toThrow(OutOfRangeError);
    expect(() => dragLock.setPairs(new Array<number>(33).fill(0))).toThrow(OutOfRangeError);

    expect(dragLock.mode.kind).toBe('pairs');
    expect(dragLock.getPairs()).toEqual(before);
  });

  it('reports a previously set meta button from getPairs', () => {
    const dragLock = new DragLock();
    dragLock.setMeta(5);
    dragLock.setPairs([0, 7]);
    expect(dragLock.mode.kind).toBe('pairs');
    expect(dragLock.getMeta()).toBe(0);
    expect(dragLock.getPairs()).toEqual([5]);

    dragLock.setMeta(0);
    dragLock.setPairs([0, 7]);
    expect(dragLock.getPairs()).toEqual([0, 7]);
  });
});

describe('DragLock meta mode', () => {
  let dragLock: DragLock;

  beforeEach(() => {
    dragLock = DragLock.fromString('10');
  });

  it('passes through buttons while not armed', () => {
    for (let i = 0; i < 10; i += 1) {
      expect(dragLock.filterButton(i, true)).toEqual({ button: i, isPress: true });
      expect(dragLock.filterButton(i, true)).toEqual({ button: i, isPress: true });
    }
  });

  it('swallows clicks of the meta button itself', () => {
    expect(run(dragLock, [
      [10, true],
      [10, false],
    ])).toEqual([0, 0]);
  });

  it('holds a button between its first and second click', () => {
    expect(run(dragLock, [
      [10, true],
      [10, false],
      [3, true],
      [3, false],
      [3, true],
      [3, false],
    ])).toEqual([0, 0, 3, 0, 0, 3]);
  });

  it('keeps the press flag unchanged', () => {
    dragLock.filterButton(10, true);
    dragLock.filterButton(10, false);
    expect(dragLock.filterButton(3, true)).toEqual({ button: 3, isPress: true });
    expect(dragLock.filterButton(3, false)).toEqual({ button: 0, isPress: false });
    expect(dragLock.filterButton(3, true)).toEqual({ button: 0, isPress: true });
    expect(dragLock.filterButton(3, false)).toEqual({ button: 3, isPress: false });
  });

  it('locks every button in turn', () => {
    for (let i = 1; i < 10; i += 1) {
      expect(run(dragLock, [
        [10, true],
        [10, false],
        [i, true],
        [i, false],
        [i, true],
        [i, false],
      ])).toEqual([0, 0, i, 0, 0, i]);
    }
  });

  it('ignores an extra meta click while a button is held', () => {
    for (let i = 1; i < 10; i += 1) {
      expect(run(dragLock, [
        [10, true],
        [10, false],
        [i, true],
        [i, false],
        [10, true],
        [10, false],
        [i, true],
        [i, false],
      ])).toEqual([0, 0, i, 0, 0, 0, 0, i]);
    }
  });

  it('holds several buttons at once', () => {
    for (let i = 1; i < 10; i += 1) {
      expect(run(dragLock, [
        [10, true],
        [10, false],
        [i, true],
        [i, false],
      ])).toEqual([0, 0, i, 0]);
    }
    for (let i = 0; i < 10; i += 1) {
      expect(run(dragLock, [
        [i, true],
        [i, false],
      ])).toEqual([0, i]);
    }
  });

  it('does not lock buttons beyond the state table', () => {
    dragLock.filterButton(10, true);
    expect(dragLock.filterButton(40, true)).toEqual({ button: 40, isPress: true });
    expect(dragLock.filterButton(40, false)).toEqual({ button: 40, isPress: false });
    // the arm is still pending for the next lockable button
    expect(run(dragLock, [
      [3, true],
      [3, false],
    ])).toEqual([3, 0]);
  });

  it('forgets held buttons on reset', () => {
    dragLock.filterButton(10, true);
    dragLock.filterButton(3, true);
    dragLock.reset();
    expect(dragLock.filterButton(3, false)).toEqual({ button: 3, isPress: false });
    expect(dragLock.mode).toEqual({ kind: 'meta', metaButton: 10 });
  });
});

describe('DragLock pairs mode', () => {
  it('remaps a single pair through the click cycle', () => {
    const dragLock = DragLock.fromString('1 11');
    expect(dragLock.filterButton(1, true)).toEqual({ button: 11, isPress: true });
    expect(dragLock.filterButton(1, false)).toEqual({ button: 0, isPress: false });
    expect(dragLock.filterButton(1, true)).toEqual({ button: 0, isPress: true });
    expect(dragLock.filterButton(1, false)).toEqual({ button: 11, isPress: false });
  });

  it('leaves unmapped buttons untouched', () => {
    const dragLock = DragLock.fromString('1 11 2 0 3 13 4 0 5 15 6 0 7 17 8 0 9 19');

    for (let i = 1; i < 10; i += 1) {
      const mapped = i % 2 === 1;
      expect(dragLock.filterButton(i, true)).toEqual({
        button: mapped ? i + 10 : i,
        isPress: true,
      });
      expect(dragLock.filterButton(i, false)).toEqual({
        button: mapped ? 0 : i,
        isPress: false,
      });
    }

    for (let i = 1; i < 10; i += 1) {
      const mapped = i % 2 === 1;
      expect(dragLock.filterButton(i, true)).toEqual({
        button: mapped ? 0 : i,
        isPress: true,
      });
      expect(dragLock.filterButton(i, false)).toEqual({
        button: mapped ? i + 10 : i,
        isPress: false,
      });
    }
  });

  it('ignores a release that arrives before the first press', () => {
    const dragLock = DragLock.fromString('2 5');
    expect(dragLock.filterButton(2, false)).toEqual({ button: 2, isPress: false });
    expect(dragLock.filterButton(2, true)).toEqual({ button: 5, isPress: true });
  });
});

describe('DragLock button 0', () => {
  it.each(['', '10', '1 11'])('is inert with config "%s"', (config) => {
    const dragLock = DragLock.fromString(config);
    const before = dragLock.mode;
    expect(dragLock.filterButton(0, true)).toEqual({ button: 0, isPress: true });
    expect(dragLock.filterButton(0, false)).toEqual({ button: 0, isPress: false });
    expect(dragLock.mode).toEqual(before);
  });

  it('does not consume a pending meta arm', () => {
    const dragLock = DragLock.fromString('10');
    dragLock.filterButton(10, true);
    dragLock.filterButton(0, true);
    expect(run(dragLock, [
      [4, true],
      [4, false],
    ])).toEqual([4, 0]);
  });
});
