/**
 * Type definitions for panelkit
 * @packageDocumentation
 */

import type { Command } from "./commands/Command";
import type { GestureKind } from "./commands/Gesture";

/** 2D position or offset */
export interface Point {
  x: number;
  y: number;
}

/** Touch identifier as reported by the input source */
export type FingerId = number;

/** Mouse buttons reported on pointer down/up */
export type MouseButton = "primary" | "middle" | "secondary";

/** Bit set in `PointerMoveEvent.buttons` while the primary button is held */
export const PRIMARY_BUTTON_MASK = 1;

/** Keyboard modifier flags, combined into a modifier mask */
export const Modifier = {
  NONE: 0,
  SHIFT: 1 << 0,
  CTRL: 1 << 1,
  ALT: 1 << 2,
  META: 1 << 3,
} as const;

/** Pointer motion in device pixels */
export interface PointerMoveEvent {
  type: "pointermove";
  /** Absolute position */
  x: number;
  y: number;
  /** Motion since the previous pointer event */
  dx: number;
  dy: number;
  /** Held-button bit mask */
  buttons: number;
}

export interface PointerDownEvent {
  type: "pointerdown";
  x: number;
  y: number;
  button: MouseButton;
  /** Click count supplied by the platform (1 single, 2 double, ...) */
  clicks: number;
}

export interface PointerUpEvent {
  type: "pointerup";
  x: number;
  y: number;
  button: MouseButton;
}

export interface WheelEvent {
  type: "wheel";
  dx: number;
  dy: number;
}

/** Touch events carry positions and deltas in normalized 0..1 space */
export interface FingerDownEvent {
  type: "fingerdown";
  fingerId: FingerId;
  x: number;
  y: number;
}

export interface FingerMotionEvent {
  type: "fingermotion";
  fingerId: FingerId;
  x: number;
  y: number;
  dx: number;
  dy: number;
}

export interface FingerUpEvent {
  type: "fingerup";
  fingerId: FingerId;
  x: number;
  y: number;
}

export interface KeyDownEvent {
  type: "keydown";
  /** Physical key name, e.g. "Escape" or "m" */
  key: string;
  /** Combination of `Modifier` flags */
  modifiers: number;
  /** True for auto-repeat presses */
  repeat: boolean;
}

/** A logical command re-injected by the command layer */
export interface CommandEvent {
  type: "command";
  command: Command;
  pressed: boolean;
}

export interface GestureEvent {
  type: "gesture";
  gesture: GestureKind;
}

/** Every input event the panel stack can dispatch */
export type PanelEvent =
  | PointerMoveEvent
  | PointerDownEvent
  | PointerUpEvent
  | WheelEvent
  | FingerDownEvent
  | FingerMotionEvent
  | FingerUpEvent
  | KeyDownEvent
  | CommandEvent
  | GestureEvent;

export type PanelEventType = PanelEvent["type"];
