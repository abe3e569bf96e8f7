/**
 * Coordinates Demo
 * ================
 * A small map widget driven entirely through the bound API surface: it
 * shows an OpenStreetMap base layer and a marker with a popup, and writes
 * the pointer's position into a readout line while the mouse is over the
 * map.
 *
 * @example
 * ```typescript
 * import { CoordinatesDemo } from "leaflet-api-surface";
 *
 * const demo = new CoordinatesDemo({ containerId: "map" });
 * demo.mount();
 * // ...
 * demo.unmount();
 * ```
 *
 * @remarks
 * Leaflet's stylesheet must be on the page; see {@link injectResources}.
 */

import * as L from "leaflet";

import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { Binding, type BoundObject } from "../runtime/Binding.js";
import { buildLeafletAssembly } from "../SurfaceAssembler.js";
import type { Assembly } from "../types.js";

export interface CoordinatesDemoConfig {
  /** Id of the element the widget renders into (with or without `#`). */
  containerId: string;
  /** Initial centre as `[lat, lng]` (default: `[51.505, -0.09]`). */
  center?: [number, number];
  /** Initial zoom level (default: 13). */
  zoom?: number;
  /** Tile URL template (default: OpenStreetMap). */
  tileUrl?: string;
  /** Attribution shown for the tile layer. */
  attribution?: string;
  /** HTML shown in the marker's popup. */
  popupContent?: string;
  /** Height of the map element (default: `"400px"`). */
  height?: string;
  /** Prebuilt assembly; built with defaults when omitted. */
  assembly?: Assembly;
  logger?: Logger;
}

const OSM_TILES = "https://tile.openstreetmap.org/{z}/{x}/{y}.png";
const OSM_ATTRIBUTION =
  '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors';

// ---------------------------------------------------------------------------
// CoordinatesDemo class
// ---------------------------------------------------------------------------

/**
 * Map widget with a live pointer-position readout.
 *
 * Call {@link mount} to render, {@link unmount} to destroy cleanly.
 */
export class CoordinatesDemo {
  private readonly config: Required<Omit<CoordinatesDemoConfig, "assembly">> & {
    assembly: Assembly | null;
  };
  private binding: Binding | null = null;
  private map: BoundObject | null = null;
  private mapEl: HTMLElement | null = null;
  private readout: HTMLElement | null = null;

  constructor(config: CoordinatesDemoConfig) {
    this.config = {
      containerId: config.containerId,
      center: config.center ?? [51.505, -0.09],
      zoom: config.zoom ?? 13,
      tileUrl: config.tileUrl ?? OSM_TILES,
      attribution: config.attribution ?? OSM_ATTRIBUTION,
      popupContent: config.popupContent ?? "Move the pointer over the map.",
      height: config.height ?? "400px",
      assembly: config.assembly ?? null,
      logger: config.logger ?? silentLogger,
    };
    this._validate();
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** Whether the widget is currently mounted. */
  public get isMounted(): boolean {
    return this.map !== null;
  }

  /** Text currently shown in the readout line. */
  public get readoutText(): string {
    return this.readout?.textContent ?? "";
  }

  /**
   * Render the map into the configured container. A second call while
   * mounted is a no-op.
   *
   * @throws {Error} If the container element cannot be found in the DOM.
   */
  public mount(): void {
    if (this.map) return;

    const raw = this.config.containerId;
    const id = raw.startsWith("#") ? raw.slice(1) : raw;
    const containerEl = document.getElementById(id);
    if (!containerEl) {
      throw new Error(`CoordinatesDemo: container element #${id} not found.`);
    }

    const mapEl = document.createElement("div");
    mapEl.className = "coordinates-demo-map";
    mapEl.style.height = this.config.height;
    const readoutEl = document.createElement("p");
    readoutEl.className = "coordinates-demo-readout";
    containerEl.append(mapEl, readoutEl);

    const assembly = this.config.assembly ?? buildLeafletAssembly({ logger: this.config.logger });
    const binding = new Binding(assembly, L, { logger: this.config.logger });

    const map = binding.construct("Map", mapEl);
    map.invoke("setView", this.config.center, this.config.zoom);

    const tileOptions = binding.construct("TileLayer.Options");
    tileOptions.set("attribution", this.config.attribution);
    map.invoke("addLayer", binding.construct("TileLayer", this.config.tileUrl, tileOptions));

    const marker = binding.construct("Marker", this.config.center);
    marker.invoke("bindPopup", this.config.popupContent);
    map.invoke("addLayer", marker);

    map.invoke("on_mousemove", this._onMouseMove);
    map.invoke("on_mouseout", this._onMouseOut);

    this.mapEl = mapEl;
    this.readout = readoutEl;
    this.binding = binding;
    this.map = map;
    this.config.logger.info("CoordinatesDemo mounted", { containerId: id });
  }

  /** Detach listeners, destroy the map and remove the widget's elements. */
  public unmount(): void {
    if (!this.map) return;

    this.map.invoke("off_mousemove", this._onMouseMove);
    this.map.invoke("off_mouseout", this._onMouseOut);
    this.map.invoke("remove");

    // Only the widget's own elements; the container may hold other content.
    this.mapEl?.remove();
    this.readout?.remove();
    this.mapEl = null;
    this.readout = null;
    this.binding = null;
    this.map = null;
  }

  // ------------------------------------------------------------------
  // Private helpers
  // ------------------------------------------------------------------

  private readonly _onMouseMove = (_self: unknown, event: unknown): void => {
    const { binding, readout } = this;
    if (!binding || !readout || !binding.isBound(event)) return;

    const latlng = event.get("latlng");
    readout.textContent = binding.isBound(latlng)
      ? `Position: ${String(latlng.invoke("toString"))}`
      : "";
  };

  private readonly _onMouseOut = (): void => {
    if (this.readout) this.readout.textContent = "";
  };

  private _validate(): void {
    const { containerId, center, zoom } = this.config;
    if (containerId.trim().length === 0) {
      throw new Error("CoordinatesDemo: containerId must not be empty.");
    }
    const [lat, lng] = center;
    if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
      throw new Error(`CoordinatesDemo: center [${lat}, ${lng}] must be finite numbers.`);
    }
    if (!Number.isFinite(zoom)) {
      throw new Error(`CoordinatesDemo: zoom ${zoom} must be a finite number.`);
    }
    if (lat < -90 || lat > 90) {
      throw new Error(`CoordinatesDemo: center lat ${lat} is outside [-90, 90].`);
    }
    if (lng < -180 || lng > 180) {
      throw new Error(`CoordinatesDemo: center lng ${lng} is outside [-180, 180].`);
    }
    if (zoom < 0 || zoom > 22) {
      throw new Error(`CoordinatesDemo: zoom ${zoom} is outside [0, 22].`);
    }
  }
}
