/**
 * Tile Coordinate Utilities
 *
 * Conversions between geographic coordinates, the integer viewport stored by
 * the map, and pixel positions on the map canvas.
 *
 * The viewport stores tile offsets relative to the pyramid's centered origin.
 * tileOffsetForZoom() converts between that and absolute tile indices.
 */

import type {
  CanvasSize,
  GeoCoordinate,
  ScreenPoint,
  ViewportState,
} from "./types";
import { geoToTile } from "./mercator";

/** Tile edge length in pixels */
export const TILE_SIZE = 256;

export const MIN_ZOOM = 0;
export const MAX_ZOOM = 19;

/**
 * Clamp a zoom level to the tile pyramid's range.
 */
export function clampZoom(zoom: number): number {
  return Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, zoom));
}

/**
 * Offset that puts the pyramid's origin tile under a {tileX: 0, tileY: 0}
 * viewport.
 *
 * @param zoom - Zoom level, negative values are treated as 0
 * @returns floor(2^zoom / 2 - 0.5)
 */
export function tileOffsetForZoom(zoom: number): number {
  const count = Math.pow(2, Math.max(0, zoom));
  return Math.floor(count / 2 - 0.5);
}

/**
 * At zoom 0 the grid has a single tile, so half a tile of bias centers it.
 */
export function centerTileBias(zoom: number): number {
  return zoom === 0 ? 0.5 : 1.0;
}

// Math.round sends -0.5 to -0; tile math wants half away from zero.
function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * Build the viewport that centers a coordinate on the canvas.
 *
 * @param coord - Coordinate to center on
 * @param zoom - Zoom level, clamped to [0, 19]
 * @returns Viewport state at the clamped zoom
 */
export function coordinateToViewport(
  coord: GeoCoordinate,
  zoom: number
): ViewportState {
  const z = clampZoom(zoom);
  const tile = geoToTile(coord, z);
  const offset = tileOffsetForZoom(z);
  const bias = centerTileBias(z);

  // `+ 0` normalises a -0 result from rounding.
  return {
    zoom: z,
    tileX: roundHalfAwayFromZero(tile.x - bias) - offset + 0,
    tileY: roundHalfAwayFromZero(tile.y - bias) - offset + 0,
  };
}

/**
 * Canvas pixel position of the viewport's anchor tile corner.
 *
 * The anchor sits one tile left of and above the canvas middle, moved half
 * a tile back toward the middle at zoom 0.
 */
export function midTileAnchor(zoom: number, canvas: CanvasSize): ScreenPoint {
  let x = Math.trunc((Math.trunc(canvas.width) - TILE_SIZE * 2) / 2);
  let y = Math.trunc((Math.trunc(canvas.height) - TILE_SIZE * 2) / 2);
  if (zoom === 0) {
    x += TILE_SIZE / 2;
    y += TILE_SIZE / 2;
  }
  return { x, y };
}

/**
 * Project a geographic coordinate onto the map canvas.
 *
 * @param coord - Coordinate to project
 * @param viewport - Current viewport
 * @param canvas - Canvas size in pixels
 * @returns Screen position, or null if the canvas has no area
 */
export function projectToScreen(
  coord: GeoCoordinate,
  viewport: ViewportState,
  canvas: CanvasSize
): ScreenPoint | null {
  if (canvas.width <= 0 || canvas.height <= 0) {
    return null;
  }

  const anchor = midTileAnchor(viewport.zoom, canvas);
  const offset = tileOffsetForZoom(viewport.zoom);
  const absX = viewport.tileX + offset;
  const absY = viewport.tileY + offset;
  const tile = geoToTile(coord, viewport.zoom);

  return {
    x: anchor.x + (tile.x - absX) * TILE_SIZE,
    y: anchor.y + (tile.y - absY) * TILE_SIZE,
  };
}

/**
 * Check if two viewport states are equal.
 */
export function viewportsEqual(a: ViewportState, b: ViewportState): boolean {
  return a.zoom === b.zoom && a.tileX === b.tileX && a.tileY === b.tileY;
}

/**
 * Get a string key for a viewport, useful for logging and Map keys.
 *
 * @returns String representation "zoom/tileX/tileY"
 */
export function viewportToString(viewport: ViewportState): string {
  return `${viewport.zoom}/${viewport.tileX}/${viewport.tileY}`;
}
