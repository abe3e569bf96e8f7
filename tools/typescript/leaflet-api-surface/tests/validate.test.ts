/**
 * Tests for assembly validation
 * =============================
 * A small registry is built through RegistryBuilder, then broken copies of
 * it are checked one property at a time.
 */

import { describe, expect, it } from "vitest";

import { AssemblyValidationError } from "../src/errors.js";
import { augmentWithEvents, eventAccessors } from "../src/events.js";
import { RegistryBuilder } from "../src/RegistryBuilder.js";
import type { Assembly, ResourceDescriptor, TypeDescriptor, TypeEntry } from "../src/types.js";
import { assertValidAssembly, validateAssembly } from "../src/validate.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildValid(): Assembly {
  const builder = new RegistryBuilder({ library: "L" });
  builder.declareType("Event", "class");
  builder.declareType("MouseEvent", "class");
  builder.declareType("Map", "class");
  builder.declareType("Map.Options", "options");

  builder.defineType("Event", {});
  builder.defineType("MouseEvent", { inherits: "Event" });
  builder.defineType("Map", { nested: ["Map.Options"] });
  builder.addEvents("Map", [
    { name: "mousemove", payload: { kind: "named", name: "MouseEvent" }, description: "" },
  ]);
  builder.defineType("Map.Options", {
    members: [
      {
        kind: "constructor",
        params: [],
        description: "",
        forward: { kind: "object-literal", fields: [] },
      },
    ],
  });

  builder.addResource({ name: "Css", kind: "stylesheet", url: "/leaflet.css", dependsOn: [] });
  builder.addResource(
    { name: "Js", kind: "script", url: "/leaflet.js", dependsOn: ["Css"] },
    true,
  );
  return builder.build();
}

function classType(name: string, extra: Partial<TypeDescriptor> = {}): TypeDescriptor {
  return {
    kind: "class",
    name,
    description: "",
    implements: [],
    nested: [],
    members: [],
    events: [],
    ...extra,
  };
}

function withTypes(assembly: Assembly, ...extra: TypeEntry[]): Assembly {
  return { ...assembly, types: { ...assembly.types, entries: [...assembly.types.entries, ...extra] } };
}

function withResources(assembly: Assembly, entries: ResourceDescriptor[]): Assembly {
  return { ...assembly, resources: { ...assembly.resources, entries } };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("validateAssembly", () => {
  it("should accept a well-formed assembly", () => {
    expect(validateAssembly(buildValid())).toEqual([]);
  });

  it("should report unresolved references with their location", () => {
    const marker = classType("Marker", {
      inherits: "Layer",
      members: [
        {
          kind: "property",
          name: "icon",
          type: { kind: "named", name: "Icon" },
          access: "readonly",
          isStatic: false,
          description: "",
        },
      ],
    });
    const alias: TypeEntry = {
      kind: "alias",
      name: "Content",
      target: { kind: "named", name: "Popup" },
      description: "",
    };

    expect(validateAssembly(withTypes(buildValid(), marker, alias))).toEqual([
      { code: "ERR_UNRESOLVED_REFERENCE", subject: "Marker", message: 'inherits references unknown type "Layer"' },
      { code: "ERR_UNRESOLVED_REFERENCE", subject: "Marker", message: 'property icon references unknown type "Icon"' },
      { code: "ERR_UNRESOLVED_REFERENCE", subject: "Content", message: 'alias target references unknown type "Popup"' },
    ]);
  });

  it("should report inheritance cycles on every type in the loop", () => {
    const issues = validateAssembly(
      withTypes(buildValid(), classType("A", { inherits: "B" }), classType("B", { inherits: "A" })),
    );
    expect(issues.filter((i) => i.code === "ERR_INHERITANCE_CYCLE").map((i) => i.subject)).toEqual([
      "A",
      "B",
    ]);
  });

  it("should report events whose accessors are missing", () => {
    const bare = classType("Beacon", {
      events: [{ name: "ping", payload: { kind: "named", name: "Event" }, description: "" }],
    });
    const messages = validateAssembly(withTypes(buildValid(), bare))
      .filter((i) => i.code === "ERR_EVENT_ACCESSORS")
      .map((i) => i.message);

    expect(messages).toEqual([
      'expected 1 "on_ping", found 0',
      'expected 1 "once_ping", found 0',
      'expected 2 "off_ping", found 0',
      'expected 1 "fire_ping", found 0',
      'expected 1 "off_ping" with 1 parameter(s), found 0',
      'expected 1 "off_ping" with 0 parameter(s), found 0',
    ]);
  });

  it("should report a duplicated event", () => {
    const ping = { name: "ping", payload: { kind: "named" as const, name: "Event" }, description: "" };
    const doubled = classType("Beacon", {
      events: [ping, ping],
      members: eventAccessors("Beacon", ping),
    });
    const issues = validateAssembly(withTypes(buildValid(), doubled));
    expect(issues).toContainEqual({
      code: "ERR_DUPLICATE_EVENT",
      subject: "Beacon",
      message: 'event "ping" is declared more than once',
    });
  });

  it("should report payloads that do not extend Event", () => {
    const latLng = classType("LatLng");
    const beacon = augmentWithEvents(classType("Beacon"), [
      { name: "ping", payload: { kind: "named", name: "LatLng" }, description: "" },
      { name: "pong", payload: { kind: "primitive", name: "string" }, description: "" },
    ]);

    expect(validateAssembly(withTypes(buildValid(), latLng, beacon))).toEqual([
      { code: "ERR_EVENT_PAYLOAD", subject: "Beacon", message: 'event "ping" payload LatLng does not extend Event' },
      { code: "ERR_EVENT_PAYLOAD", subject: "Beacon", message: 'event "pong" payload must name an Event type' },
    ]);
  });

  it("should report an options record without a zero-argument constructor", () => {
    const options: TypeDescriptor = { ...classType("Marker.Options"), kind: "options" };
    expect(validateAssembly(withTypes(buildValid(), options))).toEqual([
      {
        code: "ERR_OPTIONS_CONSTRUCTOR",
        subject: "Marker.Options",
        message: "options record has no zero-argument constructor",
      },
    ]);
  });

  it("should report a script that does not depend on the stylesheet", () => {
    const assembly = withResources(buildValid(), [
      { name: "Css", kind: "stylesheet", url: "/leaflet.css", dependsOn: [] },
      { name: "Js", kind: "script", url: "/leaflet.js", dependsOn: ["Fonts"] },
    ]);
    expect(validateAssembly(assembly)).toEqual([
      { code: "ERR_RESOURCE_DEPENDENCY", subject: "Js", message: 'depends on unknown resource "Fonts"' },
      { code: "ERR_RESOURCE_DEPENDENCY", subject: "Js", message: "script must depend on every stylesheet resource" },
    ]);
  });

  it("should report a required resource that is not registered", () => {
    const assembly: Assembly = { ...buildValid(), requires: ["Js", "Plugin"] };
    expect(validateAssembly(assembly)).toEqual([
      { code: "ERR_RESOURCE_DEPENDENCY", subject: "L", message: 'requires unknown resource "Plugin"' },
    ]);
  });
});

describe("assertValidAssembly", () => {
  it("should pass silently on a valid assembly", () => {
    expect(() => assertValidAssembly(buildValid())).not.toThrow();
  });

  it("should throw every issue at once", () => {
    const options: TypeDescriptor = { ...classType("Marker.Options"), kind: "options" };
    const broken = withTypes(buildValid(), options, classType("Marker", { inherits: "Layer" }));

    try {
      assertValidAssembly(broken);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AssemblyValidationError);
      if (err instanceof AssemblyValidationError) {
        expect(err.issues).toHaveLength(2);
        expect(err.message).toBe(
          [
            "Assembly failed validation with 2 issue(s):",
            "  [ERR_OPTIONS_CONSTRUCTOR] Marker.Options: options record has no zero-argument constructor",
            '  [ERR_UNRESOLVED_REFERENCE] Marker: inherits references unknown type "Layer"',
          ].join("\n"),
        );
      }
    }
  });
});
