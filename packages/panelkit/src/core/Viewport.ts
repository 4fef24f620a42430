/**
 * Viewport - device pixels to logical coordinates.
 *
 * Logical space is centered on the screen: (0, 0) is the middle, `left`
 * and `top` are negative half extents. Zoom is a percentage, so a zoom of
 * 200 makes every logical unit two device pixels wide.
 */

import type { Point } from "../types";
import { assertPositiveNumber } from "../validation";

/** Viewport state the panel stack reads on every conversion */
export interface ViewportSource {
  readonly zoom: number;
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}

export const DEFAULT_ZOOM = 100;

/** Device pixels to logical units at the given zoom */
export function scaleToLogical(devicePixels: number, zoom: number): number {
  return (devicePixels * 100) / zoom;
}

/** Absolute device position to a logical position, in whole units */
export function toLogicalPoint(viewport: ViewportSource, device: Point): Point {
  return {
    x: Math.trunc(viewport.left + scaleToLogical(device.x, viewport.zoom)),
    y: Math.trunc(viewport.top + scaleToLogical(device.y, viewport.zoom)),
  };
}

export class Viewport implements ViewportSource {
  private rawWidth: number;
  private rawHeight: number;
  private zoomPercent: number;

  constructor(rawWidth: number, rawHeight: number, zoom: number = DEFAULT_ZOOM) {
    assertPositiveNumber(rawWidth, "viewport.rawWidth");
    assertPositiveNumber(rawHeight, "viewport.rawHeight");
    assertPositiveNumber(zoom, "viewport.zoom");
    this.rawWidth = rawWidth;
    this.rawHeight = rawHeight;
    this.zoomPercent = zoom;
  }

  /** Update the device size, e.g. after a window resize */
  setRaw(rawWidth: number, rawHeight: number): void {
    assertPositiveNumber(rawWidth, "viewport.rawWidth");
    assertPositiveNumber(rawHeight, "viewport.rawHeight");
    this.rawWidth = rawWidth;
    this.rawHeight = rawHeight;
  }

  setZoom(zoom: number): void {
    assertPositiveNumber(zoom, "viewport.zoom");
    this.zoomPercent = zoom;
  }

  get zoom(): number {
    return this.zoomPercent;
  }

  get width(): number {
    return Math.trunc(scaleToLogical(this.rawWidth, this.zoomPercent));
  }

  get height(): number {
    return Math.trunc(scaleToLogical(this.rawHeight, this.zoomPercent));
  }

  get left(): number {
    return -Math.trunc(this.width / 2);
  }

  get top(): number {
    return -Math.trunc(this.height / 2);
  }

  toLogical(device: Point): Point {
    return toLogicalPoint(this, device);
  }
}
