/**
 * Projection Module
 *
 * Coordinate validation, Web Mercator tile math and viewport/screen
 * conversions.
 */

export type {
  GeoCoordinate,
  TileFraction,
  ViewportState,
  CanvasSize,
  ScreenPoint,
} from "./types";

export {
  geoToTile,
  haversineKm,
  clampLatitude,
  MAX_LATITUDE,
  EARTH_RADIUS_KM,
} from "./mercator";

export {
  TILE_SIZE,
  MIN_ZOOM,
  MAX_ZOOM,
  clampZoom,
  tileOffsetForZoom,
  centerTileBias,
  coordinateToViewport,
  midTileAnchor,
  projectToScreen,
  viewportsEqual,
  viewportToString,
} from "./tileCoord";

export { isValidCoordinate, nodeCoordinate } from "./validate";
