/**
 * Panel - a stackable UI unit (screen, dialog, overlay).
 *
 * `PanelHandle` is everything the panel stack calls. Every input method
 * returns whether the panel consumed the input; an unconsumed event may
 * continue to the panel below unless this one traps all events.
 *
 * `Panel` is the usual base class: input handlers default to "not
 * handled" so subclasses override only what they care about, and it keeps
 * the zone registry used for click hit-testing.
 */

import type { Command } from "../commands/Command";
import type { GestureKind } from "../commands/Gesture";
import type { FingerId, Point } from "../types";
import type { PanelStack } from "./PanelStack";
import { Zone } from "./Zone";

export interface PanelHandle {
  drag(dx: number, dy: number): boolean;
  hover(x: number, y: number): boolean;
  zoneMouseDown(point: Point): boolean;
  click(x: number, y: number, clicks: number): boolean;
  rClick(x: number, y: number): boolean;
  zoneMouseUp(point: Point): boolean;
  release(x: number, y: number): boolean;
  scroll(dx: number, dy: number): boolean;
  fingerDown(x: number, y: number, fingerId: FingerId): boolean;
  fingerMove(x: number, y: number, fingerId: FingerId): boolean;
  fingerUp(x: number, y: number, fingerId: FingerId): boolean;
  /** `key` is null for commands that did not come from a key press */
  keyDown(
    key: string | null,
    modifiers: number,
    command: Command,
    isFirstPress: boolean,
  ): boolean;
  gesture(gesture: GestureKind): boolean;

  step(): void;
  draw(): void;
  clearZones(): void;
  /** True when the panel covers the whole screen */
  isFullScreen(): boolean;
  /** True when no panel below this one may receive events */
  trapAllEvents(): boolean;
  /** Called on push with the stack that now holds the panel */
  setUI(ui: PanelStack): void;
}

export abstract class Panel implements PanelHandle {
  // Lookup only; the stack owns panels, never the other way around
  private ui: PanelStack | null = null;
  private zones: Zone[] = [];
  private pressedZone: Zone | null = null;

  drag(_dx: number, _dy: number): boolean {
    return false;
  }

  hover(_x: number, _y: number): boolean {
    return false;
  }

  click(_x: number, _y: number, _clicks: number): boolean {
    return false;
  }

  rClick(_x: number, _y: number): boolean {
    return false;
  }

  release(_x: number, _y: number): boolean {
    return false;
  }

  scroll(_dx: number, _dy: number): boolean {
    return false;
  }

  fingerDown(_x: number, _y: number, _fingerId: FingerId): boolean {
    return false;
  }

  fingerMove(_x: number, _y: number, _fingerId: FingerId): boolean {
    return false;
  }

  fingerUp(_x: number, _y: number, _fingerId: FingerId): boolean {
    return false;
  }

  keyDown(
    _key: string | null,
    _modifiers: number,
    _command: Command,
    _isFirstPress: boolean,
  ): boolean {
    return false;
  }

  gesture(_gesture: GestureKind): boolean {
    return false;
  }

  step(): void {
    // Default: do nothing
  }

  draw(): void {
    // Default: do nothing
  }

  isFullScreen(): boolean {
    return false;
  }

  trapAllEvents(): boolean {
    return false;
  }

  setUI(ui: PanelStack): void {
    this.ui = ui;
  }

  getUI(): PanelStack | null {
    return this.ui;
  }

  /** Ask the owning stack to remove this panel after the current event */
  protected popSelf(): void {
    this.ui?.pop(this);
  }

  addZone(zone: Zone): void {
    this.zones.push(zone);
  }

  getZones(): readonly Zone[] {
    return this.zones;
  }

  clearZones(): void {
    this.zones = [];
  }

  // Later zones are drawn on top of earlier ones, so they win
  zoneMouseDown(point: Point): boolean {
    for (let i = this.zones.length - 1; i >= 0; i--) {
      const zone = this.zones[i];
      if (zone.contains(point)) {
        this.pressedZone = zone;
        return true;
      }
    }
    return false;
  }

  zoneMouseUp(point: Point): boolean {
    const zone = this.pressedZone;
    if (!zone) return false;

    this.pressedZone = null;
    if (zone.contains(point)) {
      zone.action();
    }
    return true;
  }
}
