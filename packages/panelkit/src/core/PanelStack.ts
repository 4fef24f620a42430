/**
 * PanelStack - owns the stack of UI panels and routes input to them.
 *
 * Input Flow:
 * 1. The host hands one event to `handle()`
 * 2. Panels are asked from the top down, skipping panels about to be popped
 * 3. The first panel that handles the event ends the walk; a panel that
 *    traps all events ends it too, handled or not
 * 4. Queued pushes and pops are applied
 *
 * Deferred Mutation:
 * Panels push and pop (themselves included) while the stack is being
 * walked, stepped or drawn. Requests are queued and only applied by
 * `pushOrPop()`, which runs after every handled event and before stepping,
 * so no walk ever sees the stack change under it.
 *
 * Touch Handling:
 * Touches are tried as zones first (buttons), then as finger events (game
 * controls), and finally as an emulated mouse click/drag. The stack
 * remembers which finger owns a zone press and which owns an emulated drag
 * so that later motion and release events reach the right handler.
 *
 * Usage:
 * ```typescript
 * const ui = new PanelStack({ viewport: new Viewport(1280, 720) });
 * ui.push(new MainMenuPanel());
 *
 * // once per frame
 * for (const event of pendingEvents) ui.handle(event);
 * ui.stepAll();
 * ui.drawAll();
 * ```
 */

import type { Command } from "../commands/Command";
import type { GestureKind } from "../commands/Gesture";
import { StoreCommandLayer, type CommandLayer } from "../commands/CommandLayer";
import { resolvePanelStackConfig, type PanelStackConfig } from "../config";
import { PanelStackEvents } from "../events/PanelStackEvents";
import {
  PRIMARY_BUTTON_MASK,
  type FingerDownEvent,
  type FingerId,
  type FingerMotionEvent,
  type FingerUpEvent,
  type PanelEvent,
  type Point,
  type PointerDownEvent,
  type PointerMoveEvent,
} from "../types";
import { SystemLogger } from "../utils/Logger";
import type { PanelHandle } from "./Panel";
import {
  Viewport,
  scaleToLogical,
  toLogicalPoint,
  type ViewportSource,
} from "./Viewport";

export interface PanelStackOptions {
  viewport?: ViewportSource;
  commands?: CommandLayer;
  config?: Partial<PanelStackConfig>;
}

const DEFAULT_RAW_WIDTH = 1024;
const DEFAULT_RAW_HEIGHT = 768;

export class PanelStack {
  readonly viewport: ViewportSource;
  readonly commands: CommandLayer;
  readonly config: PanelStackConfig;
  readonly events = new PanelStackEvents();

  private readonly logger = new SystemLogger("PanelStack");

  private stack: PanelHandle[] = [];
  private toPush: (PanelHandle | null | undefined)[] = [];
  private toPop: PanelHandle[] = [];

  private done = false;
  private saveAllowed = false;

  // Pointer tracking, cleared only by reset()
  private zoneFingerId: FingerId | null = null;
  private panelFingerId: FingerId | null = null;
  private lastTap: number | null = null;
  private lastMouse: Point | null = null;

  constructor(options: PanelStackOptions = {}) {
    this.viewport =
      options.viewport ?? new Viewport(DEFAULT_RAW_WIDTH, DEFAULT_RAW_HEIGHT);
    this.commands = options.commands ?? new StoreCommandLayer();
    this.config = resolvePanelStackConfig(options.config);
  }

  /**
   * Hand an event to each panel from the top down until one handles it.
   * Returns false if none did.
   */
  handle(event: PanelEvent): boolean {
    this.trackMouse(event);

    let handled = false;
    for (let i = this.stack.length - 1; i >= 0 && !handled; i--) {
      const panel = this.stack[i];
      // Panels that are about to be popped cannot handle any other events.
      if (this.toPop.includes(panel)) continue;

      handled = this.dispatch(panel, event);

      // Nothing below a trapping panel sees this event.
      if (panel.trapAllEvents()) break;
    }

    this.pushOrPop();
    return handled;
  }

  private dispatch(panel: PanelHandle, event: PanelEvent): boolean {
    switch (event.type) {
      case "pointermove":
        return this.dispatchPointerMove(panel, event);
      case "pointerdown":
        return this.dispatchPointerDown(panel, event);
      case "pointerup": {
        const point = this.toLogical(event);
        return (
          panel.zoneMouseUp(point) || panel.release(point.x, point.y)
        );
      }
      case "wheel":
        return panel.scroll(event.dx, event.dy);
      case "fingerdown":
        return this.dispatchFingerDown(panel, event);
      case "fingermotion":
        return this.dispatchFingerMotion(panel, event);
      case "fingerup":
        return this.dispatchFingerUp(panel, event);
      case "keydown": {
        const command = this.commands.fromKey(event.key);
        return panel.keyDown(
          event.key,
          event.modifiers,
          command,
          !event.repeat,
        );
      }
      case "command":
        return event.pressed && this.sendCommand(panel, event.command);
      case "gesture":
        return this.dispatchGesture(panel, event.gesture);
      default: {
        const unreachable: never = event;
        return unreachable;
      }
    }
  }

  private dispatchPointerMove(
    panel: PanelHandle,
    event: PointerMoveEvent,
  ): boolean {
    if (event.buttons & PRIMARY_BUTTON_MASK) {
      return panel.drag(
        scaleToLogical(event.dx, this.viewport.zoom),
        scaleToLogical(event.dy, this.viewport.zoom),
      );
    }
    const point = this.toLogical(event);
    return panel.hover(point.x, point.y);
  }

  private dispatchPointerDown(
    panel: PanelHandle,
    event: PointerDownEvent,
  ): boolean {
    const point = this.toLogical(event);
    switch (event.button) {
      case "primary":
        return (
          panel.zoneMouseDown(point) ||
          panel.click(point.x, point.y, event.clicks)
        );
      case "secondary":
        return panel.rClick(point.x, point.y);
      case "middle":
        return false;
    }
  }

  // Zones (buttons), then finger events (game controls), then an emulated click
  private dispatchFingerDown(
    panel: PanelHandle,
    event: FingerDownEvent,
  ): boolean {
    const { x, y } = this.touchToLogical(event);

    if (panel.zoneMouseDown({ x, y })) {
      this.zoneFingerId = event.fingerId;
      return true;
    }

    // Some panels use the hover position to decide where a drag starts.
    panel.hover(x, y);
    if (panel.fingerDown(x, y, event.fingerId)) return true;

    const now = this.config.clock();
    const clicks =
      this.lastTap === null || now - this.lastTap > this.config.doubleTapWindowMs
        ? 1
        : 2;
    const handled = panel.click(x, y, clicks);
    if (handled) {
      this.panelFingerId = event.fingerId;
    }
    this.lastTap = now;
    return handled;
  }

  private dispatchFingerMotion(
    panel: PanelHandle,
    event: FingerMotionEvent,
  ): boolean {
    const { x, y } = this.touchToLogical(event);
    if (panel.fingerMove(x, y, event.fingerId)) return true;

    if (this.panelFingerId === event.fingerId) {
      return panel.drag(
        Math.trunc(event.dx * this.viewport.width),
        Math.trunc(event.dy * this.viewport.height),
      );
    }
    return false;
  }

  private dispatchFingerUp(panel: PanelHandle, event: FingerUpEvent): boolean {
    const { x, y } = this.touchToLogical(event);

    let handled = false;
    if (this.zoneFingerId === event.fingerId) {
      handled = panel.zoneMouseUp({ x, y });
      this.zoneFingerId = null;
    }
    if (!handled) {
      handled = panel.fingerUp(x, y, event.fingerId);
    }
    if (!handled && this.panelFingerId === event.fingerId) {
      handled = panel.release(x, y);
      this.panelFingerId = null;
    }
    return handled;
  }

  // A gesture the panel ignores is retried as the command it stands for.
  private dispatchGesture(panel: PanelHandle, gesture: GestureKind): boolean {
    if (panel.gesture(gesture)) return true;

    const command = this.commands.fromGesture(gesture);
    this.commands.injectOnce(command);
    return this.sendCommand(panel, command);
  }

  private sendCommand(panel: PanelHandle, command: Command): boolean {
    return panel.keyDown(null, 0, command, true);
  }

  private toLogical(device: Point): Point {
    return toLogicalPoint(this.viewport, device);
  }

  // Touch coordinates run 0..1 across the screen; logical space is centered.
  private touchToLogical(touch: Point): Point {
    return {
      x: Math.trunc((touch.x - 0.5) * this.viewport.width),
      y: Math.trunc((touch.y - 0.5) * this.viewport.height),
    };
  }

  private trackMouse(event: PanelEvent): void {
    if (
      event.type === "pointermove" ||
      event.type === "pointerdown" ||
      event.type === "pointerup"
    ) {
      this.lastMouse = { x: event.x, y: event.y };
    }
  }

  /**
   * Step all the panels forward (advance animations, move objects, etc.).
   */
  stepAll(): void {
    this.pushOrPop();

    for (const panel of this.stack) {
      panel.step();
    }
  }

  /**
   * Draw every visible panel. Zones are cleared first; panels rebuild them
   * while drawing.
   */
  drawAll(): void {
    for (const panel of this.stack) {
      panel.clearZones();
    }

    // Nothing below the topmost full-screen panel needs to be drawn.
    let first = this.stack.length;
    while (first > 0) {
      if (this.stack[--first].isFullScreen()) break;
    }

    for (let i = first; i < this.stack.length; i++) {
      this.stack[i].draw();
    }
  }

  /**
   * Queue a panel to be added on top of the stack. The panel learns which
   * stack holds it right away, so it can pop itself later.
   */
  push(panel: PanelHandle | null | undefined): void {
    panel?.setUI(this);
    this.toPush.push(panel);
  }

  /**
   * Queue a panel for removal. It stops receiving events immediately and
   * leaves the stack at the next apply; popping a panel that is not on the
   * stack does nothing.
   */
  pop(panel: PanelHandle): void {
    this.toPop.push(panel);
  }

  /**
   * Queue the given panel and every panel above it for removal.
   */
  popThrough(panel: PanelHandle): void {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      this.toPop.push(this.stack[i]);
      if (this.stack[i] === panel) break;
    }
  }

  /**
   * Whether the panel is on top of the applied stack. Panels pushed since
   * the last apply are not considered.
   */
  isTop(panel: PanelHandle): boolean {
    return (
      this.stack.length > 0 && this.stack[this.stack.length - 1] === panel
    );
  }

  /**
   * The absolute top panel, including one pushed but not yet applied.
   */
  top(): PanelHandle | null {
    if (this.toPush.length > 0) {
      return this.toPush[this.toPush.length - 1] ?? null;
    }
    return this.stack[this.stack.length - 1] ?? null;
  }

  /**
   * The lower-most panel, falling back to the first pending push.
   */
  root(): PanelHandle | null {
    if (this.stack.length === 0) {
      return this.toPush[0] ?? null;
    }
    return this.stack[0];
  }

  /** Panels on the applied stack, bottom first */
  panels(): readonly PanelHandle[] {
    return this.stack;
  }

  /**
   * Drop every panel, every queued change and all pointer state, and clear
   * the "done" flag.
   */
  reset(): void {
    const removed = this.stack.length;
    this.stack = [];
    this.toPush = [];
    this.toPop = [];
    this.done = false;
    this.zoneFingerId = null;
    this.panelFingerId = null;
    this.lastTap = null;
    this.lastMouse = null;

    this.logger.info("Reset", { removed });
    this.events.emitEvent("ui:reset", { removed });
  }

  /** Set once the session may be saved; stored for higher layers */
  setCanSave(canSave: boolean): void {
    this.saveAllowed = canSave;
  }

  canSave(): boolean {
    return this.saveAllowed;
  }

  quit(): void {
    this.done = true;
    this.logger.info("Quit requested");
    this.events.emitEvent("ui:quit", {});
  }

  isDone(): boolean {
    return this.done;
  }

  /**
   * True when no panel is stacked or waiting to be. Hosts usually take an
   * empty stack as the signal to shut down.
   */
  isEmpty(): boolean {
    return this.stack.length === 0 && this.toPush.length === 0;
  }

  /**
   * Last pointer position in logical coordinates. Unlike the positions
   * handed to panels, this one keeps its fractional part.
   */
  getMouse(): Point {
    const device = this.lastMouse ?? { x: 0, y: 0 };
    return {
      x: this.viewport.left + scaleToLogical(device.x, this.viewport.zoom),
      y: this.viewport.top + scaleToLogical(device.y, this.viewport.zoom),
    };
  }

  /** Whether a finger currently owns a zone press or an emulated drag */
  hasPointerOwnership(): boolean {
    return this.zoneFingerId !== null || this.panelFingerId !== null;
  }

  /**
   * Apply queued pushes, then queued pops.
   */
  private pushOrPop(): void {
    if (this.toPush.length > 0) {
      const pushed = this.toPush;
      this.toPush = [];
      for (const panel of pushed) {
        if (!panel) {
          this.logger.warn("Ignoring push of an empty panel handle");
          continue;
        }
        this.stack.push(panel);
        this.logger.debug("Pushed panel", { depth: this.stack.length });
        this.events.emitEvent("panel:pushed", {
          panel,
          depth: this.stack.length,
        });
      }
    }

    // Popped panels are only dropped from the stack; whoever else holds
    // them decides whether they live on.
    if (this.toPop.length > 0) {
      const popped = this.toPop;
      this.toPop = [];
      for (const panel of popped) {
        const index = this.stack.lastIndexOf(panel);
        if (index === -1) continue;
        this.stack.splice(index, 1);
        this.logger.debug("Popped panel", { depth: this.stack.length });
        this.events.emitEvent("panel:popped", {
          panel,
          depth: this.stack.length,
        });
      }
    }
  }
}
