/**
 * Discrete tile-space viewport with pan and zoom
 */

import { MAX_ZOOM, MIN_ZOOM, clampZoom } from "./projection/tileCoord";
import type { ViewportState } from "./projection/types";

// Integer halving toward zero. `+ 0` turns -0 into 0.
function halve(value: number): number {
  return Math.trunc(value / 2) + 0;
}

export class Viewport implements ViewportState {
  /** Zoom level, always within [MIN_ZOOM, MAX_ZOOM] */
  zoom: number;
  /** Tile offset east of the pyramid's centered origin */
  tileX: number;
  /** Tile offset south of the pyramid's centered origin */
  tileY: number;

  static readonly MIN_ZOOM = MIN_ZOOM;
  static readonly MAX_ZOOM = MAX_ZOOM;

  constructor(state: ViewportState = { zoom: 0, tileX: 0, tileY: 0 }) {
    if (
      !Number.isInteger(state.zoom) ||
      !Number.isInteger(state.tileX) ||
      !Number.isInteger(state.tileY)
    ) {
      throw new RangeError(
        `Viewport state must be integral, got ${state.zoom}/${state.tileX}/${state.tileY}`
      );
    }
    this.zoom = clampZoom(state.zoom);
    this.tileX = state.tileX;
    this.tileY = state.tileY;
  }

  panEast(): void {
    this.tileX++;
  }

  panWest(): void {
    this.tileX--;
  }

  panNorth(): void {
    this.tileY--;
  }

  panSouth(): void {
    this.tileY++;
  }

  /** Zoom in one level, doubling the tile offsets. No-op at MAX_ZOOM. */
  zoomIn(): void {
    if (this.zoom >= Viewport.MAX_ZOOM) return;
    this.zoom++;
    this.tileX *= 2;
    this.tileY *= 2;
  }

  /**
   * Zoom out one level, halving the tile offsets toward zero.
   * Odd offsets lose their low bit, so this does not always undo zoomIn().
   * No-op at MIN_ZOOM.
   */
  zoomOut(): void {
    if (this.zoom <= Viewport.MIN_ZOOM) return;
    this.tileX = halve(this.tileX);
    this.tileY = halve(this.tileY);
    this.zoom--;
  }

  /**
   * Step to a zoom level one level at a time so offsets are doubled or
   * halved at every intermediate level.
   */
  setZoom(target: number): void {
    const z = clampZoom(Math.trunc(target));
    while (this.zoom < z) {
      this.zoomIn();
    }
    while (this.zoom > z) {
      this.zoomOut();
    }
  }

  /**
   * Move to a target state: zoom first, then pan tile by tile.
   */
  moveTo(target: ViewportState): void {
    const x = Math.trunc(target.tileX);
    const y = Math.trunc(target.tileY);
    this.setZoom(target.zoom);
    while (this.tileX < x) this.panEast();
    while (this.tileX > x) this.panWest();
    while (this.tileY < y) this.panSouth();
    while (this.tileY > y) this.panNorth();
  }

  /** Plain copy of the current state */
  snapshot(): ViewportState {
    return { zoom: this.zoom, tileX: this.tileX, tileY: this.tileY };
  }
}
