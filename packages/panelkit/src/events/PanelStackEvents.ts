/**
 * Panel Stack Events
 *
 * Typed notifications about stack lifecycle changes. Events fire after a
 * change has been applied, so listeners always observe the new stack.
 */

import EventEmitter from "eventemitter3";
import type { PanelHandle } from "../core/Panel";

export interface PanelStackEventMap {
  /** A pending push was applied; `depth` is the new stack size */
  "panel:pushed": { panel: PanelHandle; depth: number };
  /** A pending pop erased a panel; `depth` is the new stack size */
  "panel:popped": { panel: PanelHandle; depth: number };
  "ui:reset": { removed: number };
  "ui:quit": Record<string, never>;
}

export type PanelStackEventType = keyof PanelStackEventMap;

export interface StackEvent<K extends PanelStackEventType> {
  type: K;
  data: PanelStackEventMap[K];
  timestamp: number;
}

export interface EventSubscription {
  unsubscribe(): void;
  readonly active: boolean;
}

export class PanelStackEvents {
  private readonly emitter = new EventEmitter();

  emitEvent<K extends PanelStackEventType>(
    type: K,
    data: PanelStackEventMap[K],
  ): void {
    const event: StackEvent<K> = { type, data, timestamp: Date.now() };
    this.emitter.emit(type, event);
  }

  subscribe<K extends PanelStackEventType>(
    type: K,
    handler: (event: StackEvent<K>) => void,
    once: boolean = false,
  ): EventSubscription {
    let active = true;
    const listener = (event: StackEvent<K>) => {
      if (!active) return;
      if (once) subscription.unsubscribe();
      handler(event);
    };

    this.emitter.on(type, listener);

    const subscription: EventSubscription = {
      unsubscribe: () => {
        if (!active) return;
        active = false;
        this.emitter.off(type, listener);
      },
      get active() {
        return active;
      },
    };
    return subscription;
  }

  subscribeOnce<K extends PanelStackEventType>(
    type: K,
    handler: (event: StackEvent<K>) => void,
  ): EventSubscription {
    return this.subscribe(type, handler, true);
  }

  listenerCount(type: PanelStackEventType): number {
    return this.emitter.listenerCount(type);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
