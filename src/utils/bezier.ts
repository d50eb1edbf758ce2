import { InvalidCurveError, OutOfRangeError, invariant } from './errors';

export interface BezierControlPoint {
  x: number;
  y: number;
}

export type BezierControlPoints = readonly [
  BezierControlPoint,
  BezierControlPoint,
  BezierControlPoint,
  BezierControlPoint,
];

/** Identity curve: every input maps onto itself. */
export const BEZIER_DEFAULTS: BezierControlPoints = [
  { x: 0, y: 0 },
  { x: 0, y: 0 },
  { x: 1, y: 1 },
  { x: 1, y: 1 },
];

// The curve is flattened to this many points before rasterizing.
const BEZIER_SEGMENTS = 50;

interface CanvasPoint {
  x: number;
  y: number;
}

function isUnitValue(value: number): boolean {
  return value >= 0 && value <= 1;
}

/**
 * Reject control points outside the unit square or not ordered by x.
 * @throws InvalidCurveError
 */
export function validateBezierControlPoints(controls: BezierControlPoints): void {
  controls.forEach((point, index) => {
    if (!isUnitValue(point.x) || !isUnitValue(point.y)) {
      throw new InvalidCurveError(
        `Control point ${index} (${point.x}/${point.y}) outside [0, 1]`
      );
    }
  });
  for (let i = 0; i < controls.length - 1; i += 1) {
    if (controls[i]!.x > controls[i + 1]!.x) {
      throw new InvalidCurveError(`Control point ${i} lies right of control point ${i + 1}`);
    }
  }
}

/**
 * Evaluate the curve at `t` with de Casteljau's algorithm. Each reduction
 * step writes into the integer scratch buffers, so intermediate points are
 * truncated to whole canvas units like the final sample.
 */
function decasteljau(
  controls: readonly CanvasPoint[],
  t: number,
  xs: Int32Array,
  ys: Int32Array
): CanvasPoint {
  for (let i = 0; i < controls.length; i += 1) {
    xs[i] = controls[i]!.x;
    ys[i] = controls[i]!.y;
  }
  for (let n = controls.length; n > 1; n -= 1) {
    for (let i = 0; i < n - 1; i += 1) {
      xs[i] = (1.0 - t) * xs[i]! + t * xs[i + 1]!;
      ys[i] = (1.0 - t) * ys[i]! + t * ys[i + 1]!;
    }
  }
  return { x: xs[0]!, y: ys[0]! };
}

function flattenCurve(controls: readonly CanvasPoint[], pointCount: number): CanvasPoint[] {
  const xs = new Int32Array(controls.length);
  const ys = new Int32Array(controls.length);
  const last = pointCount - 1; // so the final sample sits exactly on t = 1
  const curve: CanvasPoint[] = [];
  for (let i = 0; i <= last; i += 1) {
    curve.push(decasteljau(controls, (1.0 * i) / last, xs, ys));
  }
  return curve;
}

/** Fill `canvas[x]` for every x in [a.x, b.x] with the line through a and b. */
function lineBetween(a: CanvasPoint, b: CanvasPoint, canvas: Int32Array, written: Uint8Array): void {
  invariant(b.x < canvas.length, `line end ${b.x} beyond canvas of ${canvas.length}`);

  if (a.x === b.x) {
    canvas[a.x] = a.y;
    written[a.x] = 1;
    return;
  }

  const slope = (b.y - a.y) / (b.x - a.x);
  const offset = a.y - slope * a.x;
  for (let x = a.x; x <= b.x; x += 1) {
    canvas[x] = slope * x + offset;
    written[x] = 1;
  }
}

/**
 * Rasterize the cubic Bézier curve given by four control points in the unit
 * square into `out`: for every x in [0, out.length), `out[x]` is the curve's
 * y in the same [0, out.length) range.
 *
 * Control points must satisfy `c[i].x <= c[i + 1].x`. When the curve starts
 * right of x = 0 a line from the origin is drawn; when it ends left of the
 * last index a line to the top-right corner is drawn.
 *
 * @throws InvalidCurveError for bad control points, without touching `out`
 * @throws OutOfRangeError for an empty `out`
 */
export function cubicBezier(
  controls: BezierControlPoints,
  out: Int32Array | number[]
): void {
  const size = out.length;
  if (!Number.isInteger(size) || size < 1) {
    throw new OutOfRangeError(`Curve needs at least 1 entry, got ${size}`);
  }
  validateBezierControlPoints(controls);

  const range = size - 1;
  const scaled = controls.map((point) => ({
    x: Math.trunc(point.x * range),
    y: Math.trunc(point.y * range),
  }));

  // this isn't a drawing program, a coarse polyline is plenty
  const curve = flattenCurve(scaled, BEZIER_SEGMENTS);
  const canvas = new Int32Array(size);
  const written = new Uint8Array(size);
  const origin: CanvasPoint = { x: 0, y: 0 };
  const corner: CanvasPoint = { x: range, y: range };

  lineBetween(origin, curve[0]!, canvas, written);
  for (let i = 0; i < curve.length - 1; i += 1) {
    lineBetween(curve[i]!, curve[i + 1]!, canvas, written);
  }
  const tail = curve[curve.length - 1]!;
  if (tail.x < corner.x) {
    lineBetween(tail, corner, canvas, written);
  }

  const gap = written.indexOf(0);
  invariant(gap === -1, `curve left index ${gap} unwritten`);

  for (let x = 0; x < size; x += 1) {
    out[x] = canvas[x]!;
  }
}

/** Allocate and fill a LUT of `size` entries. */
export function buildBezierLut(controls: BezierControlPoints, size: number): Int32Array {
  if (!Number.isInteger(size) || size < 1) {
    throw new OutOfRangeError(`Curve needs at least 1 entry, got ${size}`);
  }
  const lut = new Int32Array(size);
  cubicBezier(controls, lut);
  return lut;
}

export function isSameControlPoints(a: BezierControlPoints, b: BezierControlPoints): boolean {
  return a.every((point, index) => point.x === b[index]!.x && point.y === b[index]!.y);
}
