/**
 * panelkit - panel stack controller with layered input routing
 * @packageDocumentation
 */

// Core
export { PanelStack, type PanelStackOptions } from "./core/PanelStack";
export { Panel, type PanelHandle } from "./core/Panel";
export { Zone } from "./core/Zone";
export {
  Viewport,
  DEFAULT_ZOOM,
  scaleToLogical,
  toLogicalPoint,
  type ViewportSource,
} from "./core/Viewport";
export { runFrame } from "./core/frame";

// Commands
export { Command, type CommandName } from "./commands/Command";
export { Gesture, isGestureKind, type GestureKind } from "./commands/Gesture";
export {
  StoreCommandLayer,
  type CommandLayer,
} from "./commands/CommandLayer";
export {
  createCommandStore,
  DEFAULT_KEYBINDS,
  DEFAULT_GESTURE_BINDINGS,
  type CommandStore,
  type CommandStoreState,
} from "./commands/commandStore";

// Events
export {
  PanelStackEvents,
  type PanelStackEventMap,
  type PanelStackEventType,
  type StackEvent,
  type EventSubscription,
} from "./events/PanelStackEvents";

// Ambient
export {
  resolvePanelStackConfig,
  DEFAULT_PANEL_STACK_CONFIG,
  DOUBLE_TAP_ENV,
  type PanelStackConfig,
} from "./config";
export { PanelKitError, ValidationError, ERROR_CODES, type ErrorCode } from "./errors";
export { Logger, SystemLogger, LogLevel, type LogEntry, type LoggerConfig } from "./utils/Logger";

// Types
export * from "./types";
