/**
 * Tests for SurfaceAssembler
 * ==========================
 * Builds the real bundled Leaflet assembly and checks its structural
 * properties directly, independent of validateAssembly.
 */

import { describe, expect, it, vi } from "vitest";

import { AssemblyValidationError, ConfigError } from "../src/errors.js";
import type { Logger } from "../src/logger.js";
import { referencedNames } from "../src/notation.js";
import {
  SCRIPT_RESOURCE,
  STYLESHEET_RESOURCE,
  SurfaceAssembler,
  buildLeafletAssembly,
  summariseAssembly,
} from "../src/SurfaceAssembler.js";
import type { MethodDescriptor, TypeDescriptor } from "../src/types.js";
import { validateAssembly } from "../src/validate.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const assembly = buildLeafletAssembly();
const types = assembly.types.entries.filter((e): e is TypeDescriptor => e.kind !== "alias");
const names = new Set(assembly.types.entries.map((e) => e.name));

function typeNamed(name: string): TypeDescriptor {
  const found = types.find((t) => t.name === name);
  if (!found) throw new Error(`no type ${name}`);
  return found;
}

function methodsNamed(type: TypeDescriptor, name: string): MethodDescriptor[] {
  return type.members.filter((m): m is MethodDescriptor => m.kind === "method" && m.name === name);
}

function fakeLogger(): Logger {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

// ---------------------------------------------------------------------------
// Structural properties of the bundled assembly
// ---------------------------------------------------------------------------

describe("SurfaceAssembler: bundled Leaflet assembly", () => {
  it("should pass validation", () => {
    expect(validateAssembly(assembly)).toEqual([]);
  });

  it("should declare each event at most once per type", () => {
    for (const type of types) {
      const eventNames = type.events.map((e) => e.name);
      expect(new Set(eventNames).size, type.name).toBe(eventNames.length);
    }
  });

  it("should carry exactly one on_, once_, fire_ and two off_ accessors per event", () => {
    for (const type of types) {
      for (const { name } of type.events) {
        expect(methodsNamed(type, `on_${name}`), `${type.name}.on_${name}`).toHaveLength(1);
        expect(methodsNamed(type, `once_${name}`), `${type.name}.once_${name}`).toHaveLength(1);
        expect(methodsNamed(type, `fire_${name}`), `${type.name}.fire_${name}`).toHaveLength(1);
        expect(methodsNamed(type, `off_${name}`).map((m) => m.params.length).sort()).toEqual([0, 1]);
      }
    }
  });

  it("should resolve every named reference", () => {
    for (const entry of assembly.types.entries) {
      if (entry.kind === "alias") {
        for (const ref of referencedNames(entry.target)) expect(names.has(ref), `${entry.name} -> ${ref}`).toBe(true);
        continue;
      }
      const related = [
        ...(entry.inherits ? [entry.inherits] : []),
        ...entry.implements,
        ...entry.nested,
        ...entry.events.flatMap((e) => referencedNames(e.payload)),
      ];
      for (const ref of related) expect(names.has(ref), `${entry.name} -> ${ref}`).toBe(true);
    }
  });

  it("should give every options record a zero-argument constructor", () => {
    const options = types.filter((t) => t.kind === "options");
    expect(options.length).toBeGreaterThan(0);
    for (const type of options) {
      expect(
        type.members.some((m) => m.kind === "constructor" && m.params.length === 0),
        type.name,
      ).toBe(true);
    }
  });

  it("should make the script depend on the stylesheet", () => {
    const [css, js] = assembly.resources.entries;
    expect(css).toEqual({
      name: STYLESHEET_RESOURCE,
      kind: "stylesheet",
      url: "https://unpkg.com/leaflet@1.9.4/dist/leaflet.css",
      dependsOn: [],
    });
    expect(js).toEqual({
      name: SCRIPT_RESOURCE,
      kind: "script",
      url: "https://unpkg.com/leaflet@1.9.4/dist/leaflet.js",
      dependsOn: [STYLESHEET_RESOURCE],
    });
    expect(assembly.requires).toEqual([SCRIPT_RESOURCE]);
  });

  it("should expose the pointer events the coordinates demo relies on", () => {
    const map = typeNamed("Map");
    expect(map.events.find((e) => e.name === "mousemove")?.payload).toEqual({ kind: "named", name: "MouseEvent" });
    expect(methodsNamed(map, "on_mouseout")[0]?.forward).toEqual({
      kind: "subscribe",
      primitive: "on",
      event: "mouseout",
    });
  });

  it("should nest options records under their owners", () => {
    expect(typeNamed("TileLayer").nested).toEqual(["TileLayer.Options", "TileLayer.WMS"]);
    expect(typeNamed("TileLayer.Options")).toMatchObject({ kind: "options", inherits: "GridLayer.Options" });
  });

  it("should describe static members", () => {
    const crs = typeNamed("CRS").members.find((m) => m.kind === "property" && m.name === "EPSG3857");
    expect(crs).toMatchObject({ isStatic: true, type: { kind: "named", name: "ICRS" } });
    expect(methodsNamed(typeNamed("GeoJSON"), "coordsToLatLng")[0]?.isStatic).toBe(true);
  });

  it("should keep event payloads within the Event family", () => {
    expect(typeNamed("MouseEvent").inherits).toBe("Event");
    expect(typeNamed("DragEndEvent").inherits).toBe("Event");
  });

  it("should summarise the assembly", () => {
    const summary = summariseAssembly(assembly);
    expect(summary.aliases).toBe(7);
    expect(summary.types + summary.aliases).toBe(assembly.types.entries.length);
    expect(summary.resources).toBe(2);
    expect(summary.events).toBe(types.reduce((n, t) => n + t.events.length, 0));
  });
});

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

describe("SurfaceAssembler: configuration", () => {
  it("should substitute the version into the CDN directory", () => {
    const assembler = new SurfaceAssembler({
      leafletVersion: "1.9.3",
      cdnBaseUrl: "https://cdn.example.com/leaflet/{version}/",
    });
    expect(assembler.cdnDirectory).toBe("https://cdn.example.com/leaflet/1.9.3");
    expect(assembler.assemble().resources.entries.map((r) => r.url)).toEqual([
      "https://cdn.example.com/leaflet/1.9.3/leaflet.css",
      "https://cdn.example.com/leaflet/1.9.3/leaflet.js",
    ]);
  });

  it("should accept root-relative CDN directories", () => {
    expect(new SurfaceAssembler({ cdnBaseUrl: "/vendor/leaflet" }).cdnDirectory).toBe("/vendor/leaflet");
  });

  it("should use the configured library global", () => {
    const built = buildLeafletAssembly({ library: "Leaflet" });
    expect(built.library).toBe("Leaflet");
    expect(built.resources.name).toBe("Leaflet.Resources");
  });

  it("should throw ConfigError for an invalid library name", () => {
    expect(() => new SurfaceAssembler({ library: "1L" })).toThrow(ConfigError);
  });

  it("should throw ConfigError for a non-semantic version", () => {
    expect(() => new SurfaceAssembler({ leafletVersion: "latest" })).toThrow(
      'SurfaceAssembler: leafletVersion "latest" is not a semantic version.',
    );
  });

  it("should throw ConfigError for a relative CDN path", () => {
    try {
      new SurfaceAssembler({ cdnBaseUrl: "cdn.example.com/leaflet" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe("ERR_INVALID_CONFIG");
        expect(err.context).toEqual({ field: "cdnBaseUrl", value: "cdn.example.com/leaflet" });
      }
    }
  });
});

// ---------------------------------------------------------------------------
// Extra definitions and logging
// ---------------------------------------------------------------------------

describe("SurfaceAssembler: extra definitions", () => {
  it("should register plugin types against the bundled ones", () => {
    const built = buildLeafletAssembly({
      extraDefinitions: [
        {
          library: "leaflet.heat",
          section: "heat",
          types: [
            {
              name: "HeatLayer",
              kind: "class",
              inherits: "Layer",
              constructors: [{ params: ["latlngs: LatLngExpression[]"] }],
              events: [{ name: "redraw", payload: "Event", description: "Heat redrawn." }],
            },
          ],
        },
      ],
    });
    expect(built.types.entries.some((e) => e.name === "HeatLayer")).toBe(true);
  });

  it("should fail validation when a plugin references an unknown type", () => {
    const build = (): unknown =>
      buildLeafletAssembly({
        extraDefinitions: [
          {
            library: "leaflet.heat",
            section: "heat",
            types: [{ name: "HeatLayer", kind: "class", inherits: "HeatBase" }],
          },
        ],
      });
    expect(build).toThrow(AssemblyValidationError);
  });

  it("should skip validation when disabled, with a warning", () => {
    const logger = fakeLogger();
    const built = buildLeafletAssembly({
      validate: false,
      logger,
      extraDefinitions: [
        { library: "leaflet.heat", section: "heat", types: [{ name: "HeatLayer", kind: "class", inherits: "HeatBase" }] },
      ],
    });
    expect(built.types.entries.some((e) => e.name === "HeatLayer")).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("Assembly validation skipped");
  });

  it("should log the summary once built", () => {
    const logger = fakeLogger();
    const built = buildLeafletAssembly({ logger });
    expect(logger.info).toHaveBeenCalledWith("Assembly built", {
      library: "L",
      leafletVersion: "1.9.4",
      ...summariseAssembly(built),
    });
  });
});
