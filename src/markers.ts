/**
 * Marker placement for positioned nodes
 */

import type { Feature, FeatureCollection, Point } from "geojson";
import { nodeDisplayName, type MapNode } from "./nodes";
import { projectToScreen } from "./projection/tileCoord";
import { nodeCoordinate } from "./projection/validate";
import type {
  CanvasSize,
  GeoCoordinate,
  ScreenPoint,
  ViewportState,
} from "./projection/types";

export interface MarkerPlacement {
  nodeId: string;
  tooltip: string;
  coordinate: GeoCoordinate;
  /** Marker tip position on the canvas */
  screen: ScreenPoint;
}

export interface MarkerLayout {
  markers: MarkerPlacement[];
  totalNodes: number;
  positionedNodes: number;
  /** No node has a position; the view shows its empty state */
  empty: boolean;
}

export interface MarkerProperties {
  nodeId: string;
  tooltip: string;
  screenX: number;
  screenY: number;
}

/**
 * Tooltip text: the display name, followed by the node ID when they differ.
 */
export function markerTooltip(node: MapNode): string {
  const name = nodeDisplayName(node) || node.nodeId;
  if (name === node.nodeId) {
    return name;
  }
  return `${name} (${node.nodeId})`;
}

/**
 * Whether a marker at `pos` should be drawn on a canvas of `size`.
 *
 * @param pad - Distance outside the canvas still treated as visible
 */
export function isMarkerVisible(
  pos: ScreenPoint,
  size: CanvasSize,
  pad: number
): boolean {
  if (size.width <= 0 || size.height <= 0) {
    return false;
  }
  if (pos.x < -pad || pos.y < -pad) {
    return false;
  }
  return pos.x <= size.width + pad && pos.y <= size.height + pad;
}

/**
 * Project every positioned node and keep those on or near the canvas.
 */
export function layoutMarkers(
  nodes: readonly MapNode[],
  viewport: ViewportState,
  canvas: CanvasSize,
  pad: number
): MarkerLayout {
  const markers: MarkerPlacement[] = [];
  let positionedNodes = 0;

  for (const node of nodes) {
    const coordinate = nodeCoordinate(node);
    if (!coordinate) continue;
    positionedNodes++;

    const screen = projectToScreen(coordinate, viewport, canvas);
    if (!screen || !isMarkerVisible(screen, canvas, pad)) continue;

    markers.push({
      nodeId: node.nodeId,
      tooltip: markerTooltip(node),
      coordinate,
      screen,
    });
  }

  return {
    markers,
    totalNodes: nodes.length,
    positionedNodes,
    empty: positionedNodes === 0,
  };
}

/**
 * Export placed markers as GeoJSON points (lon/lat order).
 */
export function markersToGeoJSON(
  markers: readonly MarkerPlacement[]
): FeatureCollection<Point, MarkerProperties> {
  return {
    type: "FeatureCollection",
    features: markers.map((marker): Feature<Point, MarkerProperties> => ({
      type: "Feature",
      id: marker.nodeId,
      geometry: {
        type: "Point",
        coordinates: [marker.coordinate.longitude, marker.coordinate.latitude],
      },
      properties: {
        nodeId: marker.nodeId,
        tooltip: marker.tooltip,
        screenX: marker.screen.x,
        screenY: marker.screen.y,
      },
    })),
  };
}
