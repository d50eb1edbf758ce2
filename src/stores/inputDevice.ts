import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import { DragLock } from '@/engine/dragLock/dragLock';
import { applyDragLockProperty, encodeDragLockProperty } from '@/engine/dragLock/dragLockProperty';
import type { ButtonEvent } from '@/engine/dragLock/types';
import { BEZIER_DEFAULTS, type BezierControlPoints } from '@/utils/bezier';
import { InvalidConfigError, InvalidCurveError } from '@/utils/errors';
import {
  buildPressureCurveLut,
  parsePressureCurveOption,
  pressureCurveFromProperty,
  pressureCurveToProperty,
  samplePressureCurve,
} from '@/utils/pressureCurve';

// Button numbers the display server accepts in a button event.
const MAX_POSTED_BUTTON = 256;

export interface InputDeviceCapabilities {
  pointer: boolean;
  tabletPressure: boolean;
}

/** Driver options as they appear in the configuration files. */
export interface InputDeviceOptions {
  DragLockButtons?: string | null;
  TabletToolPressureCurve?: string | null;
}

export interface InputDeviceSettings {
  id: string;
  capabilities: InputDeviceCapabilities;
  /** Drag lock in property layout, see encodeDragLockProperty(). */
  dragLockButtons: number[];
  /** Pressure curve control points in property layout, x0 y0 ... x3 y3. */
  pressureCurve: number[];
  /** Bumped on every configuration change. */
  revision: number;
}

// Per-device filter state. Kept outside the store: the drag lock mutates on
// every button event and the LUT is a large typed array.
interface InputDeviceRuntime {
  dragLock: DragLock;
  pressureLut: Int32Array | null;
}

interface InputDeviceState {
  devices: Record<string, InputDeviceSettings>;

  registerDevice: (
    id: string,
    capabilities: InputDeviceCapabilities,
    options?: InputDeviceOptions
  ) => void;
  removeDevice: (id: string) => void;
  applyOptions: (id: string, options: InputDeviceOptions) => void;
  reset: () => void;

  getDragLockProperty: (id: string) => number[];
  setDragLockProperty: (id: string, values: readonly number[], checkOnly?: boolean) => void;
  getPressureCurveProperty: (id: string) => number[];
  setPressureCurveProperty: (id: string, values: readonly number[], checkOnly?: boolean) => void;

  /** Filtered button event, or `null` when nothing should be posted. */
  handleButton: (id: string, button: number, isPress: boolean) => ButtonEvent | null;
  /** Pressure axis value, or `null` for devices without pressure. */
  handlePressure: (id: string, pressure: number) => number | null;
}

const runtimes = new Map<string, InputDeviceRuntime>();

const initialState: Pick<InputDeviceState, 'devices'> = {
  devices: {},
};

function requireRuntime(id: string): InputDeviceRuntime {
  const runtime = runtimes.get(id);
  if (!runtime) {
    throw new Error(`[InputDevice] Unknown device "${id}"`);
  }
  return runtime;
}

function requireSettings<T>(devices: Record<string, T>, id: string): T {
  const settings = devices[id];
  if (!settings) {
    throw new Error(`[InputDevice] Unknown device "${id}"`);
  }
  return settings;
}

function dragLockFromOption(option: string | null | undefined): DragLock {
  const dragLock = new DragLock();
  try {
    dragLock.initFromString(option);
  } catch (error) {
    if (!(error instanceof InvalidConfigError)) throw error;
    console.error(`[InputDevice] Invalid DragLockButtons option: "${option ?? ''}"`, error);
  }
  return dragLock;
}

function pressureCurveFromOption(option: string | null | undefined): BezierControlPoints {
  if (option === null || option === undefined) return BEZIER_DEFAULTS;
  try {
    return parsePressureCurveOption(option);
  } catch (error) {
    if (!(error instanceof InvalidCurveError)) throw error;
    console.error(`[InputDevice] Invalid pressure curve: ${option}`, error);
    return BEZIER_DEFAULTS;
  }
}

export const inputDeviceStore = createStore<InputDeviceState>()(
  immer((set, get) => ({
    ...initialState,

    registerDevice: (id, capabilities, options = {}) => {
      runtimes.set(id, { dragLock: new DragLock(), pressureLut: null });
      set((state) => {
        state.devices[id] = {
          id,
          capabilities: { ...capabilities },
          dragLockButtons: [],
          pressureCurve: pressureCurveToProperty(BEZIER_DEFAULTS),
          revision: 0,
        };
      });
      get().applyOptions(id, options);
    },

    removeDevice: (id) => {
      runtimes.delete(id);
      set((state) => {
        delete state.devices[id];
      });
    },

    applyOptions: (id, options) => {
      const { capabilities } = requireSettings(get().devices, id);
      const runtime = requireRuntime(id);

      // reconfiguration always starts from a fresh lock
      runtime.dragLock = capabilities.pointer
        ? dragLockFromOption(options.DragLockButtons)
        : new DragLock();
      const pressureCurve = capabilities.tabletPressure
        ? pressureCurveFromOption(options.TabletToolPressureCurve)
        : BEZIER_DEFAULTS;
      runtime.pressureLut = buildPressureCurveLut(pressureCurve);

      set((state) => {
        const settings = requireSettings(state.devices, id);
        settings.dragLockButtons = encodeDragLockProperty(runtime.dragLock);
        settings.pressureCurve = pressureCurveToProperty(pressureCurve);
        settings.revision += 1;
      });
    },

    reset: () => {
      runtimes.clear();
      set(initialState);
    },

    getDragLockProperty: (id) => [...requireSettings(get().devices, id).dragLockButtons],

    setDragLockProperty: (id, values, checkOnly = false) => {
      const runtime = requireRuntime(id);
      applyDragLockProperty(runtime.dragLock, values, { checkOnly });
      if (checkOnly) return;
      set((state) => {
        const settings = requireSettings(state.devices, id);
        settings.dragLockButtons = encodeDragLockProperty(runtime.dragLock);
        settings.revision += 1;
      });
    },

    getPressureCurveProperty: (id) => [...requireSettings(get().devices, id).pressureCurve],

    setPressureCurveProperty: (id, values, checkOnly = false) => {
      const runtime = requireRuntime(id);
      const pressureCurve = pressureCurveFromProperty(values);
      if (checkOnly) return;
      runtime.pressureLut = buildPressureCurveLut(pressureCurve);
      set((state) => {
        const settings = requireSettings(state.devices, id);
        settings.pressureCurve = pressureCurveToProperty(pressureCurve);
        settings.revision += 1;
      });
    },

    handleButton: (id, button, isPress) => {
      const { capabilities } = requireSettings(get().devices, id);
      if (!capabilities.pointer) return null;

      const event = requireRuntime(id).dragLock.filterButton(button, isPress);
      if (event.button <= 0 || event.button >= MAX_POSTED_BUTTON) return null;
      return event;
    },

    handlePressure: (id, pressure) => {
      const { capabilities } = requireSettings(get().devices, id);
      if (!capabilities.tabletPressure) return null;
      return samplePressureCurve(requireRuntime(id).pressureLut, pressure);
    },
  }))
);
