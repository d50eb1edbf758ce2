import {
  BEZIER_DEFAULTS,
  buildBezierLut,
  cubicBezier,
  isSameControlPoints,
  type BezierControlPoint,
  type BezierControlPoints,
} from './bezier';
import { InvalidCurveError, PropertyMismatchError } from './errors';

export type PressureCurvePreset = 'linear' | 'soft' | 'hard' | 'scurve';

export const PRESSURE_AXIS_MAX = 2047;
export const PRESSURE_CURVE_LUT_SIZE = PRESSURE_AXIS_MAX + 1;

// Size of the throwaway LUT used to vet control points before committing.
const VALIDATION_LUT_SIZE = 64;

const FLOAT_PATTERN = '[+-]?(?:\\d+(?:\\.\\d*)?|\\.\\d+)(?:[eE][+-]?\\d+)?';
const PAIR_PATTERN = `\\s*(${FLOAT_PATTERN})/\\s*(${FLOAT_PATTERN})`;
// Text after the fourth pair is ignored, as the option always has been.
const OPTION_PATTERN = new RegExp(`^${PAIR_PATTERN}${PAIR_PATTERN}${PAIR_PATTERN}${PAIR_PATTERN}`);

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function toControlPoints(values: readonly number[]): BezierControlPoints {
  // option and property values are single-precision floats on the wire
  const at = (index: number): BezierControlPoint => ({
    x: Math.fround(values[index * 2] ?? 0),
    y: Math.fround(values[index * 2 + 1] ?? 0),
  });
  return [at(0), at(1), at(2), at(3)];
}

/**
 * Check that the control points produce a curve at all.
 * @throws InvalidCurveError
 */
export function validatePressureCurve(points: BezierControlPoints): void {
  cubicBezier(points, new Int32Array(VALIDATION_LUT_SIZE));
}

/**
 * Parse a TabletToolPressureCurve option, `"x0/y0 x1/y1 x2/y2 x3/y3"`.
 * @throws InvalidCurveError
 */
export function parsePressureCurveOption(option: string): BezierControlPoints {
  const match = OPTION_PATTERN.exec(option);
  if (!match) {
    throw new InvalidCurveError(`Invalid pressure curve: ${option}`);
  }
  const points = toControlPoints(match.slice(1, 9).map(Number));
  try {
    validatePressureCurve(points);
  } catch (error) {
    if (error instanceof InvalidCurveError) {
      throw new InvalidCurveError(`Invalid pressure curve: ${option} (${error.message})`);
    }
    throw error;
  }
  return points;
}

export function formatPressureCurve(points: BezierControlPoints): string {
  return points.map((point) => `${point.x}/${point.y}`).join(' ');
}

/** Flatten control points into the 8-value property layout. */
export function pressureCurveToProperty(points: BezierControlPoints): number[] {
  return points.flatMap((point) => [point.x, point.y]);
}

/**
 * Read the 8-value pressure curve property layout.
 * @throws PropertyMismatchError on a wrong value count
 * @throws InvalidCurveError on an unusable curve
 */
export function pressureCurveFromProperty(values: readonly number[]): BezierControlPoints {
  if (values.length !== 8) {
    throw new PropertyMismatchError(`Pressure curve property needs 8 values, got ${values.length}`);
  }
  const points = toControlPoints(values);
  validatePressureCurve(points);
  return points;
}

export function isDefaultPressureCurve(points: BezierControlPoints): boolean {
  return isSameControlPoints(points, BEZIER_DEFAULTS);
}

export function getPressureCurvePresetPoints(preset: PressureCurvePreset): BezierControlPoints {
  switch (preset) {
    case 'soft':
      return [
        { x: 0, y: 0 },
        { x: 0.1, y: 0.5 },
        { x: 0.5, y: 1 },
        { x: 1, y: 1 },
      ];
    case 'hard':
      return [
        { x: 0, y: 0 },
        { x: 0.5, y: 0 },
        { x: 0.9, y: 0.5 },
        { x: 1, y: 1 },
      ];
    case 'scurve':
      return [
        { x: 0, y: 0 },
        { x: 0.5, y: 0 },
        { x: 0.5, y: 1 },
        { x: 1, y: 1 },
      ];
    case 'linear':
    default:
      return BEZIER_DEFAULTS;
  }
}

/**
 * Pressure axis LUT for the curve, or `null` for the identity curve where
 * raw pressure is used as-is.
 */
export function buildPressureCurveLut(
  points: BezierControlPoints,
  lutSize: number = PRESSURE_CURVE_LUT_SIZE
): Int32Array | null {
  if (isDefaultPressureCurve(points)) return null;
  return buildBezierLut(points, lutSize);
}

/**
 * Map normalized pressure onto the pressure axis, through the LUT when one
 * is set. The axis spans [0, lut.length - 1], or [0, PRESSURE_AXIS_MAX]
 * without a LUT.
 */
export function samplePressureCurve(lut: Int32Array | null | undefined, pressure: number): number {
  const p = clamp01(pressure);
  if (!lut || lut.length < 2) {
    return PRESSURE_AXIS_MAX * p;
  }
  const value = (lut.length - 1) * p;
  return lut[Math.trunc(value)] ?? value;
}
