/**
 * Turns raw scroll and drag input into viewport transitions and schedules
 * debounced persistence of the result.
 */

import { Debouncer } from "./Debouncer";
import { Viewport } from "./Viewport";
import { resolveOptions, type MapEngineOptions } from "./config";
import { silentLogger, type Logger } from "./logger";
import { viewportToString } from "./projection/tileCoord";
import type {
  CanvasSize,
  ScreenPoint,
  ViewportState,
} from "./projection/types";

export interface ScrollInput {
  deltaX: number;
  deltaY: number;
  /** Cursor position on the canvas */
  position: ScreenPoint;
}

export interface DragInput {
  deltaX: number;
  deltaY: number;
}

export interface GestureControllerOptions {
  options?: Partial<MapEngineOptions>;
  logger?: Logger;
  /** Called with the settled viewport once input has been quiet */
  onPersist?: (state: ViewportState) => void;
  /** Called synchronously after every viewport change */
  onChange?: (state: ViewportState) => void;
}

/**
 * Signed number of pan steps for a normalised cursor offset.
 *
 * @param norm - Cursor offset from canvas center in [-1, 1]
 * @returns 0 inside the dead zone, ±2 at or past the boost ratio, else ±1
 */
export function zoomFocusPanSteps(
  norm: number,
  deadZone: number,
  boost: number
): number {
  const absNorm = Math.abs(norm);
  if (absNorm < deadZone) {
    return 0;
  }
  const steps = absNorm >= boost ? 2 : 1;
  return norm < 0 ? -steps : steps;
}

function clampUnit(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

export class GestureController {
  readonly viewport: Viewport;

  private readonly options: MapEngineOptions;
  private readonly logger: Logger;
  private readonly persist: Debouncer;
  private readonly onPersist?: (state: ViewportState) => void;
  private readonly onChange?: (state: ViewportState) => void;

  private canvas: CanvasSize = { width: 0, height: 0 };
  private scrollAccumulator = 0;
  private dragAccumulatorX = 0;
  private dragAccumulatorY = 0;

  constructor(viewport: Viewport, config: GestureControllerOptions = {}) {
    this.viewport = viewport;
    this.options = resolveOptions(config.options);
    this.logger = config.logger ?? silentLogger;
    this.persist = new Debouncer(this.options.persistDebounceMs, this.logger);
    this.onPersist = config.onPersist;
    this.onChange = config.onChange;
  }

  /** Update the canvas size used for cursor-anchored zoom */
  setCanvasSize(size: CanvasSize): void {
    this.canvas = { width: size.width, height: size.height };
  }

  zoomIn(): void {
    this.viewport.zoomIn();
    this.commit("button");
  }

  zoomOut(): void {
    this.viewport.zoomOut();
    this.commit("button");
  }

  panNorth(): void {
    this.viewport.panNorth();
    this.commit("button");
  }

  panSouth(): void {
    this.viewport.panSouth();
    this.commit("button");
  }

  panEast(): void {
    this.viewport.panEast();
    this.commit("button");
  }

  panWest(): void {
    this.viewport.panWest();
    this.commit("button");
  }

  setZoom(target: number): void {
    this.viewport.setZoom(target);
    this.commit("zoom");
  }

  /** Move to a target viewport, e.g. after recentering */
  moveTo(target: ViewportState): void {
    this.viewport.moveTo(target);
    this.commit("move");
  }

  /**
   * Scroll to zoom. The dominant axis is accumulated and every full step
   * zooms one level. Zoom-in also pans toward the cursor.
   */
  handleScroll(input: ScrollInput): void {
    let primary = input.deltaY;
    if (Math.abs(input.deltaX) > Math.abs(primary)) {
      primary = input.deltaX;
    }
    if (primary === 0 || !Number.isFinite(primary)) return;

    const step = this.options.zoomStepThreshold;
    // Zoom is bounded, so more than a full pyramid of steps is never useful.
    const limit = step * (Viewport.MAX_ZOOM + 1);
    this.scrollAccumulator = Math.max(
      -limit,
      Math.min(limit, this.scrollAccumulator + primary)
    );

    let changed = false;
    while (this.scrollAccumulator >= step) {
      const before = this.viewport.zoom;
      this.viewport.zoomIn();
      if (this.viewport.zoom !== before) {
        this.panTowardCursor(input.position);
      }
      this.scrollAccumulator -= step;
      changed = true;
    }
    while (this.scrollAccumulator <= -step) {
      this.viewport.zoomOut();
      this.scrollAccumulator += step;
      changed = true;
    }

    if (changed) {
      this.commit("scroll");
    }
  }

  /**
   * Drag to pan. Content follows the pointer, so dragging right reveals
   * what lies west.
   */
  handleDrag(input: DragInput): void {
    if (input.deltaX === 0 && input.deltaY === 0) return;
    if (!Number.isFinite(input.deltaX) || !Number.isFinite(input.deltaY)) {
      return;
    }

    const threshold = this.options.dragPanThreshold;
    this.dragAccumulatorX += input.deltaX;
    this.dragAccumulatorY += input.deltaY;

    let changed = false;
    while (this.dragAccumulatorX >= threshold) {
      this.viewport.panWest();
      this.dragAccumulatorX -= threshold;
      changed = true;
    }
    while (this.dragAccumulatorX <= -threshold) {
      this.viewport.panEast();
      this.dragAccumulatorX += threshold;
      changed = true;
    }
    while (this.dragAccumulatorY >= threshold) {
      this.viewport.panNorth();
      this.dragAccumulatorY -= threshold;
      changed = true;
    }
    while (this.dragAccumulatorY <= -threshold) {
      this.viewport.panSouth();
      this.dragAccumulatorY += threshold;
      changed = true;
    }

    if (changed) {
      this.commit("drag");
    }
  }

  /** True while a persistence run is waiting */
  hasPendingPersist(): boolean {
    return this.persist.isPending();
  }

  /** Cancel pending persistence */
  dispose(): void {
    this.persist.cancel();
  }

  private panTowardCursor(cursor: ScreenPoint): void {
    const halfWidth = this.canvas.width / 2;
    const halfHeight = this.canvas.height / 2;
    if (halfWidth <= 0 || halfHeight <= 0) return;

    const { zoomFocusDeadZone, zoomFocusBoost } = this.options;
    const xSteps = zoomFocusPanSteps(
      clampUnit((cursor.x - halfWidth) / halfWidth),
      zoomFocusDeadZone,
      zoomFocusBoost
    );
    const ySteps = zoomFocusPanSteps(
      clampUnit((cursor.y - halfHeight) / halfHeight),
      zoomFocusDeadZone,
      zoomFocusBoost
    );

    for (let i = 0; i < Math.abs(xSteps); i++) {
      if (xSteps > 0) this.viewport.panEast();
      else this.viewport.panWest();
    }
    for (let i = 0; i < Math.abs(ySteps); i++) {
      if (ySteps > 0) this.viewport.panSouth();
      else this.viewport.panNorth();
    }
  }

  private commit(source: string): void {
    const state = this.viewport.snapshot();
    this.logger.debug(
      `Viewport changed by ${source}: ${viewportToString(state)}`
    );
    this.onChange?.(state);
    this.schedulePersist();
  }

  private schedulePersist(): void {
    const onPersist = this.onPersist;
    if (!onPersist) return;

    const seq = this.persist.schedule(() => {
      // Snapshot at fire time, not schedule time.
      const state = this.viewport.snapshot();
      this.logger.info(`Persisting viewport ${viewportToString(state)}`);
      onPersist(state);
    });
    this.logger.debug(`Scheduled viewport persistence #${seq}`);
  }
}
