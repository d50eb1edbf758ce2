export { DragLock } from './engine/dragLock/dragLock';
export {
  DRAG_LOCK_PROPERTY_NAME,
  applyDragLockProperty,
  encodeDragLockProperty,
  type DragLockPropertyOptions,
} from './engine/dragLock/dragLockProperty';
export { parseDragLockConfig, type ParsedDragLockConfig } from './engine/dragLock/parseDragLockConfig';
export {
  DRAGLOCK_MAX_BUTTONS,
  type ButtonEvent,
  type DragLockButtonState,
  type DragLockMode,
  type DragLockModeKind,
} from './engine/dragLock/types';
export {
  BEZIER_DEFAULTS,
  buildBezierLut,
  cubicBezier,
  validateBezierControlPoints,
  type BezierControlPoint,
  type BezierControlPoints,
} from './utils/bezier';
export {
  PRESSURE_AXIS_MAX,
  PRESSURE_CURVE_LUT_SIZE,
  buildPressureCurveLut,
  formatPressureCurve,
  getPressureCurvePresetPoints,
  isDefaultPressureCurve,
  parsePressureCurveOption,
  pressureCurveFromProperty,
  pressureCurveToProperty,
  samplePressureCurve,
  type PressureCurvePreset,
} from './utils/pressureCurve';
export {
  InputFilterError,
  InvalidConfigError,
  InvalidCurveError,
  OutOfRangeError,
  PropertyMismatchError,
  isInputFilterError,
  type InputFilterErrorCode,
} from './utils/errors';
export {
  inputDeviceStore,
  type InputDeviceCapabilities,
  type InputDeviceOptions,
  type InputDeviceSettings,
} from './stores/inputDevice';
