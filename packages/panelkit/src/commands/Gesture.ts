/**
 * Touch gestures recognized by the input source.
 *
 * Panels may react to a gesture directly; anything they ignore is turned
 * into a logical command through the command layer's gesture bindings.
 */
export const Gesture = {
  NONE: "none",
  X: "x",
  CIRCLE: "circle",
  CARET_UP: "caretUp",
  CARET_DOWN: "caretDown",
  CARET_LEFT: "caretLeft",
  CARET_RIGHT: "caretRight",
  ZOOM_IN: "zoomIn",
  ZOOM_OUT: "zoomOut",
} as const;

export type GestureKind = (typeof Gesture)[keyof typeof Gesture];

export function isGestureKind(value: string): value is GestureKind {
  return Object.values(Gesture).some((gesture) => gesture === value);
}
