/**
 * Web Mercator Projection
 *
 * Functions for converting WGS84 coordinates into fractional tile
 * coordinates of a power-of-two tile pyramid.
 */

import type { GeoCoordinate, TileFraction } from "./types";

/** Degrees to radians conversion factor */
const DEG_TO_RAD = Math.PI / 180;

/** Maximum latitude for Web Mercator projection (~85.05 degrees) */
export const MAX_LATITUDE = 85.05112878;

/** Mean Earth radius used for great-circle distances */
export const EARTH_RADIUS_KM = 6371;

/**
 * Clamp latitude to the valid Web Mercator range.
 *
 * @param lat - Latitude in degrees
 * @returns Clamped latitude between -MAX_LATITUDE and MAX_LATITUDE
 */
export function clampLatitude(lat: number): number {
  return Math.max(-MAX_LATITUDE, Math.min(MAX_LATITUDE, lat));
}

/**
 * Convert WGS84 coordinates to fractional tile coordinates.
 *
 * At zoom z the world spans 2^z tiles on each axis:
 * - x=0 is 180°W, x=2^z is 180°E
 * - y=0 is ~85°N, y=2^z is ~85°S
 *
 * @param coord - Geographic coordinate
 * @param zoom - Zoom level
 * @returns Tile-space position, integer part is the tile index
 */
export function geoToTile(coord: GeoCoordinate, zoom: number): TileFraction {
  const n = Math.pow(2, zoom);
  const latRad = clampLatitude(coord.latitude) * DEG_TO_RAD;
  const x = ((coord.longitude + 180) / 360) * n;
  const y =
    ((1 - Math.log(Math.tan(latRad) + 1 / Math.cos(latRad)) / Math.PI) / 2) *
    n;
  return { x, y };
}

/**
 * Great-circle distance between two coordinates.
 *
 * @returns Distance in kilometers
 */
export function haversineKm(a: GeoCoordinate, b: GeoCoordinate): number {
  const lat1 = a.latitude * DEG_TO_RAD;
  const lat2 = b.latitude * DEG_TO_RAD;
  const dLat = lat2 - lat1;
  const dLon = (b.longitude - a.longitude) * DEG_TO_RAD;

  const sinLat = Math.sin(dLat / 2);
  const sinLon = Math.sin(dLon / 2);
  const h =
    sinLat * sinLat + Math.cos(lat1) * Math.cos(lat2) * sinLon * sinLon;

  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}
