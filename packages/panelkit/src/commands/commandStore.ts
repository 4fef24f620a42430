/**
 * Command Store
 *
 * Zustand store backing the logical-command layer: key bindings per
 * command (rebindable), gesture bindings, and the one-shot injection
 * queue used to redeliver synthesized commands on a later pass.
 *
 * @packageDocumentation
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import { Command, type CommandName } from "./Command";
import defaultKeybinds from "./defaultKeybinds.json";
import { Gesture, type GestureKind } from "./Gesture";

/** Default key per command; keys use `KeyboardEvent.key` names */
export const DEFAULT_KEYBINDS: Readonly<Record<CommandName, string>> =
  defaultKeybinds;

/** Default command per gesture; `null` means the gesture maps to nothing */
export const DEFAULT_GESTURE_BINDINGS: Readonly<
  Record<GestureKind, CommandName | null>
> = {
  [Gesture.NONE]: null,
  [Gesture.X]: "MENU",
  [Gesture.CIRCLE]: "SELECT",
  [Gesture.CARET_UP]: "MAP",
  [Gesture.CARET_DOWN]: "INFO",
  [Gesture.CARET_LEFT]: "LAND",
  [Gesture.CARET_RIGHT]: "JUMP",
  [Gesture.ZOOM_IN]: "ZOOM_IN",
  [Gesture.ZOOM_OUT]: "ZOOM_OUT",
};

/** Single-character keys are matched without regard to case */
function normalizeKey(key: string): string {
  return key.length === 1 ? key.toLowerCase() : key;
}

export interface CommandStoreState {
  /** Keys the user rebound, by command name */
  customBindings: Partial<Record<CommandName, string>>;
  gestureBindings: Record<GestureKind, CommandName | null>;
  /** Commands waiting for redelivery, oldest first */
  injected: Command[];

  // Actions
  /** Key bound to a command (custom or default) */
  getKey: (name: CommandName) => string;
  /** All commands bound to a key, combined; NONE when unbound */
  commandForKey: (key: string) => Command;
  commandForGesture: (gesture: GestureKind) => Command;
  setKeybind: (name: CommandName, key: string) => void;
  resetKeybind: (name: CommandName) => void;
  resetAllKeybinds: () => void;
  setGestureBinding: (gesture: GestureKind, name: CommandName | null) => void;
  /** Queue a command for one redelivery; a queued duplicate is not added again */
  injectOnce: (command: Command) => void;
  /** Drain the injection queue */
  takeInjected: () => Command[];
}

export type CommandStore = StoreApi<CommandStoreState>;

export function createCommandStore(): CommandStore {
  return createStore<CommandStoreState>()((set, get) => ({
    customBindings: {},
    gestureBindings: { ...DEFAULT_GESTURE_BINDINGS },
    injected: [],

    getKey: (name: CommandName) => {
      const custom = get().customBindings[name];
      if (custom !== undefined) return custom;
      return DEFAULT_KEYBINDS[name];
    },

    commandForKey: (key: string) => {
      const wanted = normalizeKey(key);
      let command = Command.NONE;
      for (const name of Command.ACTIONS) {
        if (normalizeKey(get().getKey(name)) === wanted) {
          command = command.or(Command.named(name));
        }
      }
      return command;
    },

    commandForGesture: (gesture: GestureKind) => {
      const name = get().gestureBindings[gesture];
      return name === null ? Command.NONE : Command.named(name);
    },

    setKeybind: (name: CommandName, key: string) => {
      set((state) => ({
        customBindings: { ...state.customBindings, [name]: key },
      }));
    },

    resetKeybind: (name: CommandName) => {
      set((state) => {
        const { [name]: _, ...rest } = state.customBindings;
        return { customBindings: rest };
      });
    },

    resetAllKeybinds: () => {
      set({ customBindings: {} });
    },

    setGestureBinding: (gesture: GestureKind, name: CommandName | null) => {
      set((state) => ({
        gestureBindings: { ...state.gestureBindings, [gesture]: name },
      }));
    },

    injectOnce: (command: Command) => {
      if (command.isNone()) return;
      if (get().injected.some((queued) => queued.equals(command))) return;
      set((state) => ({ injected: [...state.injected, command] }));
    },

    takeInjected: () => {
      const injected = get().injected;
      if (injected.length > 0) {
        set({ injected: [] });
      }
      return injected;
    },
  }));
}
