/**
 * Projection Types
 *
 * Type definitions for the coordinate systems used by the map engine.
 */

/** WGS84 latitude/longitude in degrees */
export interface GeoCoordinate {
  latitude: number;
  longitude: number;
}

/** Fractional tile coordinate at some zoom level */
export interface TileFraction {
  x: number;
  y: number;
}

/**
 * Integer viewport position in tile space.
 *
 * tileX/tileY are offsets from the pyramid's centered origin and are not
 * clamped to the pyramid's bounds.
 */
export interface ViewportState {
  zoom: number;
  tileX: number;
  tileY: number;
}

/** Canvas size in pixels */
export interface CanvasSize {
  width: number;
  height: number;
}

/** Position on the canvas in pixels */
export interface ScreenPoint {
  x: number;
  y: number;
}
