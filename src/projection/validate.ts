/**
 * Coordinate validation
 *
 * Every coordinate read from a node passes through here before it reaches
 * projection or centroid code. Invalid positions are treated as absent.
 */

import type { MapNode } from "../nodes";
import type { GeoCoordinate } from "./types";

/**
 * Check that a latitude/longitude pair is finite and within WGS84 bounds.
 */
export function isValidCoordinate(lat: number, lon: number): boolean {
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    return false;
  }
  return lat >= -90 && lat <= 90 && lon >= -180 && lon <= 180;
}

/**
 * Extract a node's position.
 *
 * @returns The coordinate, or null when the node has no usable position
 */
export function nodeCoordinate(node: MapNode): GeoCoordinate | null {
  const { latitude, longitude } = node;
  if (latitude == null || longitude == null) {
    return null;
  }
  if (!isValidCoordinate(latitude, longitude)) {
    return null;
  }
  return { latitude, longitude };
}
