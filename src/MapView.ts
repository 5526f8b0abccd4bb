/**
 * MapView - node map state: viewport, gestures, auto-centering and markers
 */

import { GestureController } from "./GestureController";
import { Viewport } from "./Viewport";
import {
  configToViewport,
  resolveOptions,
  type MapEngineOptions,
  type MapViewportConfig,
} from "./config";
import { chooseCenter } from "./geo/centroid";
import { createConsoleLogger, type Logger } from "./logger";
import { layoutMarkers, type MarkerLayout } from "./markers";
import type { MapNode, NodeRegistry } from "./nodes";
import {
  coordinateToViewport,
  viewportToString,
} from "./projection/tileCoord";
import type { CanvasSize, ViewportState } from "./projection/types";

export interface MapViewOptions {
  registry: NodeRegistry;
  /** ID of the local device's node, preferred as map center */
  localNodeId?: () => string;
  /** Previously saved viewport; disables auto-centering when set */
  initialViewport?: MapViewportConfig;
  /** Receives the settled viewport for persistence */
  onViewportChanged?: (state: ViewportState) => void;
  /** Receives a fresh marker layout after every redraw-worthy change */
  onRender?: (layout: MarkerLayout) => void;
  options?: Partial<MapEngineOptions>;
  logger?: Logger;
}

export class MapView {
  readonly viewport: Viewport;
  readonly gestures: GestureController;

  private readonly options: MapEngineOptions;
  private readonly logger: Logger;
  private readonly localNodeId?: () => string;
  private readonly onRender?: (layout: MarkerLayout) => void;
  private readonly unsubscribe: () => void;

  private nodes: MapNode[] = [];
  private autoCentered = false;
  private canvas: CanvasSize = { width: 0, height: 0 };
  private layout: MarkerLayout = {
    markers: [],
    totalNodes: 0,
    positionedNodes: 0,
    empty: true,
  };

  constructor(config: MapViewOptions) {
    this.options = resolveOptions(config.options);
    this.logger = config.logger ?? createConsoleLogger("MapView");
    this.localNodeId = config.localNodeId;
    this.onRender = config.onRender;

    this.viewport = new Viewport();
    this.gestures = new GestureController(this.viewport, {
      options: this.options,
      logger: this.logger,
      onPersist: config.onViewportChanged,
      onChange: () => this.render(),
    });

    const saved = config.initialViewport
      ? configToViewport(config.initialViewport)
      : null;
    this.logger.info(
      `Initializing map view (saved viewport: ${saved !== null})`
    );
    if (saved) {
      this.logger.debug(`Applying saved viewport ${viewportToString(saved)}`);
      this.viewport.moveTo(saved);
      this.autoCentered = true;
    }

    const registry = config.registry;
    this.setNodes(registry.snapshot(), true);
    this.unsubscribe = registry.subscribe(() => {
      this.setNodes(registry.snapshot(), false);
    });
  }

  /**
   * Replace the node snapshot. Auto-centers until centering has succeeded
   * once; a saved viewport disables it from the start.
   */
  setNodes(nodes: readonly MapNode[], initial: boolean): void {
    this.nodes = [...nodes];
    this.logger.debug(
      `Updating map nodes (initial: ${initial}, count: ${this.nodes.length})`
    );

    if (!this.autoCentered) {
      const zoom =
        this.viewport.zoom === 0 ? this.options.defaultZoom : this.viewport.zoom;
      if (this.centerOnPreferred(zoom)) {
        this.logger.info(
          `Auto-centered map at ${viewportToString(this.viewport)}`
        );
        this.autoCentered = true;
      } else {
        this.logger.debug("Skipped auto-centering: no node positions");
      }
    }

    this.render();
  }

  /**
   * Center on the preferred node or node cluster at the current zoom.
   *
   * @returns False when no node has a usable position
   */
  recenter(): boolean {
    const target = this.resolveCenterViewport(this.viewport.zoom);
    if (!target) return false;
    this.gestures.moveTo(target);
    return true;
  }

  /** Update the canvas size; re-lays out markers when it changes */
  resize(size: CanvasSize): void {
    if (size.width === this.canvas.width && size.height === this.canvas.height) {
      return;
    }
    this.canvas = { width: size.width, height: size.height };
    this.gestures.setCanvasSize(this.canvas);
    this.render();
  }

  getState(): ViewportState {
    return this.viewport.snapshot();
  }

  getLayout(): MarkerLayout {
    return this.layout;
  }

  isAutoCentered(): boolean {
    return this.autoCentered;
  }

  /** Stop listening to the registry and drop pending persistence */
  dispose(): void {
    this.unsubscribe();
    this.gestures.dispose();
  }

  private resolveCenterViewport(zoom: number): ViewportState | null {
    const localId = this.localNodeId?.() ?? "";
    const center = chooseCenter(this.nodes, localId);
    if (!center) {
      this.logger.debug(
        `Map center not resolved (nodes: ${this.nodes.length}, local: "${localId}")`
      );
      return null;
    }
    this.logger.debug(
      `Map center resolved at ${center.latitude}, ${center.longitude} (zoom ${zoom})`
    );
    return coordinateToViewport(center, zoom);
  }

  private centerOnPreferred(zoom: number): boolean {
    const target = this.resolveCenterViewport(zoom);
    if (!target) return false;
    this.viewport.moveTo(target);
    return true;
  }

  private render(): void {
    this.layout = layoutMarkers(
      this.nodes,
      this.viewport.snapshot(),
      this.canvas,
      this.options.markerOutsidePad
    );
    this.logger.debug(
      `Rendered ${this.layout.markers.length} of ${this.layout.positionedNodes} positioned nodes at ${viewportToString(this.viewport)}`
    );
    this.onRender?.(this.layout);
  }
}
