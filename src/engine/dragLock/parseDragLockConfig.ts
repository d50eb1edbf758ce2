import { InvalidConfigError } from '@/utils/errors';
import { DRAGLOCK_MAX_BUTTONS } from './types';

export type ParsedDragLockConfig =
  | { kind: 'disabled' }
  | { kind: 'meta'; metaButton: number }
  | { kind: 'pairs'; mapping: number[] };

interface IntegerToken {
  value: number;
  /** Index just past the digits, or the start index when nothing was read. */
  end: number;
}

const WHITESPACE = new Set([' ', '\t', '\n', '\v', '\f', '\r']);

// Same acceptance rules as strtol(str, &end, 10): leading whitespace, an
// optional sign, then decimal digits. On failure `end` stays at `start`.
function readInteger(source: string, start: number): IntegerToken {
  let i = start;
  while (i < source.length && WHITESPACE.has(source[i]!)) i += 1;

  let sign = 1;
  if (source[i] === '+' || source[i] === '-') {
    sign = source[i] === '-' ? -1 : 1;
    i += 1;
  }

  const digitsStart = i;
  let value = 0;
  while (i < source.length) {
    const code = source.charCodeAt(i);
    if (code < 48 || code > 57) break;
    value = value * 10 + (code - 48);
    i += 1;
  }

  if (i === digitsStart) {
    return { value: 0, end: start };
  }
  return { value: sign * value, end: i };
}

function isButton(value: number): boolean {
  return value > 0 && value < DRAGLOCK_MAX_BUTTONS;
}

/**
 * Parse a DragLockButtons option.
 *
 * `"<meta>"` selects meta mode (`"0"` disables), `"<button> <target> ..."`
 * selects pairs mode. Anything left over after the last integer, trailing
 * whitespace included, rejects the whole string.
 */
export function parseDragLockConfig(config: string | null | undefined): ParsedDragLockConfig {
  if (config === null || config === undefined || config === '') {
    return { kind: 'disabled' };
  }

  const single = readInteger(config, 0);
  if (single.end === config.length) {
    if (single.value === 0) {
      // stacked config snippets use "0" to switch drag lock off again
      return { kind: 'disabled' };
    }
    if (!isButton(single.value)) {
      throw new InvalidConfigError(`Meta button ${single.value} out of range in "${config}"`);
    }
    return { kind: 'meta', metaButton: single.value };
  }

  const mapping = new Array<number>(DRAGLOCK_MAX_BUTTONS).fill(0);
  let cursor = 0;
  while (cursor < config.length) {
    const button = readInteger(config, cursor);
    if (button.end === config.length) {
      throw new InvalidConfigError(`Button ${button.value} has no target in "${config}"`);
    }

    const target = readInteger(config, button.end);
    if (target.end === button.end) {
      throw new InvalidConfigError(`Malformed button pair in "${config}"`);
    }
    if (!isButton(button.value)) {
      throw new InvalidConfigError(`Button ${button.value} out of range in "${config}"`);
    }
    if (target.value < 0 || target.value >= DRAGLOCK_MAX_BUTTONS) {
      throw new InvalidConfigError(`Target ${target.value} out of range in "${config}"`);
    }

    mapping[button.value] = target.value;
    cursor = target.end;
  }

  if (mapping.every((target) => target === 0)) {
    return { kind: 'disabled' };
  }
  return { kind: 'pairs', mapping };
}
