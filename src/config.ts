/**
 * Engine options and persisted viewport configuration
 */

import { clampZoom } from "./projection/tileCoord";
import type { ViewportState } from "./projection/types";

export interface MapEngineOptions {
  /** Zoom used when auto-centering from zoom 0 */
  defaultZoom: number;
  /** Accumulated scroll delta per zoom step */
  zoomStepThreshold: number;
  /** Accumulated drag distance in pixels per pan step */
  dragPanThreshold: number;
  /** Quiet period before the viewport is persisted */
  persistDebounceMs: number;
  /** Normalised cursor offset below which zoom-in does not pan */
  zoomFocusDeadZone: number;
  /** Normalised cursor offset at or above which zoom-in pans two tiles */
  zoomFocusBoost: number;
  /** Markers this far outside the canvas still count as visible */
  markerOutsidePad: number;
}

export const DEFAULT_OPTIONS: Readonly<MapEngineOptions> = {
  defaultZoom: 11,
  zoomStepThreshold: 15,
  dragPanThreshold: 96,
  persistDebounceMs: 500,
  zoomFocusDeadZone: 0.18,
  zoomFocusBoost: 0.65,
  markerOutsidePad: 20,
};

export function resolveOptions(
  options: Partial<MapEngineOptions> = {}
): MapEngineOptions {
  return {
    defaultZoom: options.defaultZoom ?? DEFAULT_OPTIONS.defaultZoom,
    zoomStepThreshold:
      options.zoomStepThreshold ?? DEFAULT_OPTIONS.zoomStepThreshold,
    dragPanThreshold:
      options.dragPanThreshold ?? DEFAULT_OPTIONS.dragPanThreshold,
    persistDebounceMs:
      options.persistDebounceMs ?? DEFAULT_OPTIONS.persistDebounceMs,
    zoomFocusDeadZone:
      options.zoomFocusDeadZone ?? DEFAULT_OPTIONS.zoomFocusDeadZone,
    zoomFocusBoost: options.zoomFocusBoost ?? DEFAULT_OPTIONS.zoomFocusBoost,
    markerOutsidePad:
      options.markerOutsidePad ?? DEFAULT_OPTIONS.markerOutsidePad,
  };
}

/** Last viewport chosen by the user, as stored in the settings file */
export interface MapViewportConfig {
  set: boolean;
  zoom: number;
  x: number;
  y: number;
}

export const UNSET_VIEWPORT: Readonly<MapViewportConfig> = {
  set: false,
  zoom: 0,
  x: 0,
  y: 0,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Normalise a stored viewport record.
 *
 * Unset or malformed records become UNSET_VIEWPORT. A set record has its
 * zoom clamped to the pyramid range.
 */
export function normalizeMapViewport(raw: unknown): MapViewportConfig {
  if (!isRecord(raw) || raw.set !== true) {
    return { ...UNSET_VIEWPORT };
  }
  const { zoom, x, y } = raw;
  if (
    typeof zoom !== "number" ||
    typeof x !== "number" ||
    typeof y !== "number" ||
    !Number.isInteger(zoom) ||
    !Number.isInteger(x) ||
    !Number.isInteger(y)
  ) {
    return { ...UNSET_VIEWPORT };
  }
  return { set: true, zoom: clampZoom(zoom), x, y };
}

export function viewportToConfig(state: ViewportState): MapViewportConfig {
  return { set: true, zoom: state.zoom, x: state.tileX, y: state.tileY };
}

/**
 * @returns The stored viewport, or null when none was saved
 */
export function configToViewport(
  config: MapViewportConfig
): ViewportState | null {
  if (!config.set) return null;
  return { zoom: config.zoom, tileX: config.x, tileY: config.y };
}
