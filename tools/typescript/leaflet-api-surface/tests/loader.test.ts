/**
 * Tests for the definition loader
 * ===============================
 */

import { beforeEach, describe, expect, it } from "vitest";

import { loadDefinitions, parseDefinitionFile } from "../src/definitions/index.js";
import type { DefinitionFile } from "../src/definitions/index.js";
import { DefinitionError } from "../src/errors.js";
import { RegistryBuilder } from "../src/RegistryBuilder.js";
import type { MemberDescriptor, TypeDescriptor } from "../src/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const MARKERS: DefinitionFile = {
  library: "leaflet",
  section: "markers",
  types: [
    {
      name: "Marker",
      kind: "class",
      constructors: [{ params: ["latlng: LatLng"] }],
      properties: [{ name: "latlng", type: "LatLng" }],
      methods: [{ name: "getLatLng", returns: "LatLng" }],
      events: [{ name: "dragend", payload: "Event", description: "Drag finished." }],
    },
    {
      name: "Icon.Options",
      kind: "options",
      constructors: [{ params: ["iconUrl: string"] }],
      properties: [{ name: "iconUrl", type: "string", default: "marker-icon.png" }],
    },
  ],
};

const GEOMETRY: DefinitionFile = {
  library: "leaflet",
  section: "geometry",
  types: [
    { name: "Event", kind: "class" },
    { name: "LatLng", kind: "class", methods: [{ name: "clone", returns: "LatLng", static: false }] },
  ],
};

function problemsOf(data: unknown): unknown {
  try {
    parseDefinitionFile(data, "test.json");
  } catch (err) {
    if (err instanceof DefinitionError) return err.context.problems;
  }
  return null;
}

function typeNamed(builder: RegistryBuilder, name: string): TypeDescriptor {
  const entry = builder.build().types.entries.find((e) => e.name === name);
  if (!entry || entry.kind === "alias") throw new Error(`no type ${name}`);
  return entry;
}

function member(type: TypeDescriptor, name: string): MemberDescriptor | undefined {
  return type.members.find((m) => m.kind !== "constructor" && m.name === name);
}

// ---------------------------------------------------------------------------
// Schema validation
// ---------------------------------------------------------------------------

describe("parseDefinitionFile", () => {
  it("should return a conforming document unchanged", () => {
    expect(parseDefinitionFile(MARKERS)).toBe(MARKERS);
  });

  it("should list a missing required property", () => {
    expect(problemsOf({ library: "leaflet", section: "core" })).toEqual([
      "/ must have required property 'types'",
    ]);
  });

  it("should list unknown keys on a type", () => {
    expect(
      problemsOf({ library: "leaflet", section: "core", types: [{ name: "Map", kind: "class", color: "red" }] }),
    ).toEqual(["/types/0 must NOT have additional properties"]);
  });

  it("should reject an unknown type kind", () => {
    expect(() =>
      parseDefinitionFile({ library: "leaflet", section: "core", types: [{ name: "Map", kind: "struct" }] }, "core.json"),
    ).toThrow(/^Definitions: core\.json does not match the schema:/);
  });

  it("should carry the error code for schema violations", () => {
    try {
      parseDefinitionFile(42);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DefinitionError);
      if (err instanceof DefinitionError) {
        expect(err.code).toBe("ERR_INVALID_DEFINITION_FILE");
        expect(err.context.file).toBe("definition file");
      }
    }
  });
});

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

describe("loadDefinitions", () => {
  let builder: RegistryBuilder;

  beforeEach(() => {
    builder = new RegistryBuilder({ library: "L" });
  });

  it("should resolve references to types from a later document", () => {
    const files = loadDefinitions(builder, [MARKERS, GEOMETRY]);
    expect(files.map((f) => f.section)).toEqual(["markers", "geometry"]);
    expect(builder.build().types.entries.map((e) => e.name)).toEqual([
      "Marker",
      "Icon.Options",
      "Event",
      "LatLng",
    ]);
  });

  it("should default class properties to read-only and options fields to read-write", () => {
    loadDefinitions(builder, [MARKERS, GEOMETRY]);
    expect(member(typeNamed(builder, "Marker"), "latlng")).toMatchObject({ access: "readonly" });
    expect(member(typeNamed(builder, "Icon.Options"), "iconUrl")).toEqual({
      kind: "property",
      name: "iconUrl",
      type: { kind: "primitive", name: "string" },
      access: "readwrite",
      isStatic: false,
      description: "",
      defaultValue: "marker-icon.png",
    });
  });

  it("should give options records an empty constructor ahead of their own", () => {
    loadDefinitions(builder, [MARKERS, GEOMETRY]);
    const ctors = typeNamed(builder, "Icon.Options").members.filter((m) => m.kind === "constructor");
    expect(ctors).toEqual([
      {
        kind: "constructor",
        params: [],
        description: "Creates an empty Icon.Options; unset fields keep the library defaults.",
        forward: { kind: "object-literal", fields: [] },
      },
      {
        kind: "constructor",
        params: [{ name: "iconUrl", type: { kind: "primitive", name: "string" }, optional: false }],
        description: "",
        forward: { kind: "object-literal", fields: ["iconUrl"] },
      },
    ]);
  });

  it("should forward class constructors and methods to the library", () => {
    loadDefinitions(builder, [MARKERS, GEOMETRY]);
    const marker = typeNamed(builder, "Marker");
    expect(marker.members[0]).toMatchObject({ kind: "constructor", forward: { kind: "construct" } });
    expect(member(marker, "getLatLng")).toMatchObject({
      returns: { kind: "named", name: "LatLng" },
      forward: { kind: "call", method: "getLatLng" },
    });
  });

  it("should derive event accessors for declared events", () => {
    loadDefinitions(builder, [MARKERS, GEOMETRY]);
    const marker = typeNamed(builder, "Marker");
    expect(marker.events.map((e) => e.name)).toEqual(["dragend"]);
    expect(member(marker, "fire_dragend")).toMatchObject({ forward: { kind: "fire", event: "dragend" } });
  });

  it("should locate notation errors in the offending member", () => {
    const broken: DefinitionFile = {
      library: "leaflet",
      section: "broken",
      types: [{ name: "Map", kind: "class", methods: [{ name: "getCenter", returns: "LatLng |" }] }],
    };
    expect(() => loadDefinitions(builder, [broken])).toThrow(
      'Definitions: Map.getCenter: Notation: unexpected end at 8 in "LatLng |"',
    );
  });

  it("should reject the same type in two documents", () => {
    expect(() => loadDefinitions(builder, [GEOMETRY, GEOMETRY])).toThrow(
      'RegistryBuilder: type "Event" is already declared.',
    );
  });

  it("should label documents by position in schema errors", () => {
    expect(() => loadDefinitions(builder, [GEOMETRY, { library: "leaflet" }])).toThrow(
      /^Definitions: definition #2 does not match the schema:/,
    );
  });
});
