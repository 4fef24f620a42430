import type { Point } from "../types";

/**
 * Clickable rectangle registered by a panel while it draws.
 * Zones are cleared before every draw pass and rebuilt by the panel.
 */
export class Zone {
  constructor(
    readonly center: Point,
    readonly width: number,
    readonly height: number,
    readonly action: () => void = () => {},
  ) {}

  get left(): number {
    return this.center.x - this.width / 2;
  }

  get right(): number {
    return this.center.x + this.width / 2;
  }

  get top(): number {
    return this.center.y - this.height / 2;
  }

  get bottom(): number {
    return this.center.y + this.height / 2;
  }

  // Edges are inclusive on the top-left and exclusive on the bottom-right
  contains(point: Point): boolean {
    return (
      point.x >= this.left &&
      point.x < this.right &&
      point.y >= this.top &&
      point.y < this.bottom
    );
  }
}
