// 32 buttons cover every pointing device we care about; this bounds both
// source and target button numbers.
export const DRAGLOCK_MAX_BUTTONS = 32;

export type DragLockMode =
  | { kind: 'disabled' }
  | { kind: 'meta'; metaButton: number }
  | { kind: 'pairs'; mapping: readonly number[] };

export type DragLockModeKind = DragLockMode['kind'];

export type DragLockButtonState = 'none' | 'down1' | 'up1' | 'down2';

export interface ButtonEvent {
  button: number;
  isPress: boolean;
}
