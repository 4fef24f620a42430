import type { Command } from "./Command";
import type { GestureKind } from "./Gesture";
import { createCommandStore, type CommandStore } from "./commandStore";

/**
 * What the panel stack needs from the command-binding layer.
 */
export interface CommandLayer {
  /** Command bound to a physical key */
  fromKey(key: string): Command;
  /** Command a gesture stands for */
  fromGesture(gesture: GestureKind): Command;
  /** Queue a command for redelivery on a later dispatch pass */
  injectOnce(command: Command): void;
  /** Drain commands queued by `injectOnce` */
  takeInjected(): Command[];
}

/**
 * CommandLayer backed by a command store.
 */
export class StoreCommandLayer implements CommandLayer {
  constructor(readonly store: CommandStore = createCommandStore()) {}

  fromKey(key: string): Command {
    return this.store.getState().commandForKey(key);
  }

  fromGesture(gesture: GestureKind): Command {
    return this.store.getState().commandForGesture(gesture);
  }

  injectOnce(command: Command): void {
    this.store.getState().injectOnce(command);
  }

  takeInjected(): Command[] {
    return this.store.getState().takeInjected();
  }
}
