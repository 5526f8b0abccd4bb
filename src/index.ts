/**
 * meshmap - viewport and projection engine for mesh node maps
 */

export { MapView, type MapViewOptions } from "./MapView";
export { Viewport } from "./Viewport";
export {
  GestureController,
  zoomFocusPanSteps,
  type GestureControllerOptions,
  type ScrollInput,
  type DragInput,
} from "./GestureController";
export { Debouncer } from "./Debouncer";
export {
  DEFAULT_OPTIONS,
  UNSET_VIEWPORT,
  resolveOptions,
  normalizeMapViewport,
  viewportToConfig,
  configToViewport,
  type MapEngineOptions,
  type MapViewportConfig,
} from "./config";
export {
  chooseCenter,
  robustClusterCenter,
  median,
  OUTLIER_THRESHOLD,
} from "./geo/centroid";
export {
  layoutMarkers,
  isMarkerVisible,
  markerTooltip,
  markersToGeoJSON,
  type MarkerLayout,
  type MarkerPlacement,
  type MarkerProperties,
} from "./markers";
export { nodeDisplayName, type MapNode, type NodeRegistry } from "./nodes";
export { createConsoleLogger, silentLogger, type Logger } from "./logger";
export * from "./projection/index";
