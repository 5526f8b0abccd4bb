/**
 * Robust map center selection
 *
 * Picks a representative center for a set of node positions. Uses medians
 * and a median-absolute-deviation cut so a single node with a bad GPS fix
 * cannot drag the map away from the main cluster.
 */

import { haversineKm } from "../projection/mercator";
import { nodeCoordinate } from "../projection/validate";
import type { GeoCoordinate } from "../projection/types";
import type { MapNode } from "../nodes";

/** Points farther than median + OUTLIER_THRESHOLD * MAD are dropped */
export const OUTLIER_THRESHOLD = 3.5;

/** Below this many points the plain median center is returned */
const MIN_POINTS_FOR_OUTLIER_REJECTION = 4;

/**
 * Median of a sequence. Even lengths average the two middle values.
 *
 * @returns The median, or 0 for an empty sequence
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[mid]!;
  }
  return (sorted[mid - 1]! + sorted[mid]!) / 2;
}

function medianCenter(points: readonly GeoCoordinate[]): GeoCoordinate {
  return {
    latitude: median(points.map((p) => p.latitude)),
    longitude: median(points.map((p) => p.longitude)),
  };
}

/**
 * Median center of a point set after rejecting distance outliers.
 *
 * @returns Center coordinate, or null for an empty set
 */
export function robustClusterCenter(
  points: readonly GeoCoordinate[]
): GeoCoordinate | null {
  if (points.length === 0) {
    return null;
  }

  const center = medianCenter(points);
  if (points.length < MIN_POINTS_FOR_OUTLIER_REJECTION) {
    return center;
  }

  const distances = points.map((p) => haversineKm(center, p));
  const distMedian = median(distances);
  const mad = median(distances.map((d) => Math.abs(d - distMedian)));
  if (mad <= 0) {
    return center;
  }

  const maxDistance = distMedian + OUTLIER_THRESHOLD * mad;
  const filtered = points.filter((_, i) => distances[i]! <= maxDistance);
  if (filtered.length === 0) {
    return center;
  }

  return medianCenter(filtered);
}

/**
 * Choose where to center the map.
 *
 * The preferred node (normally the local device) wins outright when it has
 * a valid position. Otherwise the robust cluster center of all positioned
 * nodes is used.
 *
 * @param nodes - Registry snapshot
 * @param preferredNodeId - Node ID to center on if positioned
 * @returns Center coordinate, or null when no node has a valid position
 */
export function chooseCenter(
  nodes: readonly MapNode[],
  preferredNodeId?: string | null
): GeoCoordinate | null {
  const preferred = preferredNodeId?.trim() ?? "";
  const points: GeoCoordinate[] = [];

  for (const node of nodes) {
    const coord = nodeCoordinate(node);
    if (!coord) continue;
    if (preferred !== "" && node.nodeId === preferred) {
      return coord;
    }
    points.push(coord);
  }

  return robustClusterCenter(points);
}
