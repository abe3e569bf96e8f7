/**
 * Leaflet API Surface: Type Definitions
 * =====================================
 * The descriptor model consumed by {@link RegistryBuilder}, {@link Binding}
 * and {@link DeclarationEmitter}. Every value here is plain data and is
 * frozen once an {@link Assembly} has been built.
 */

import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Type references
// ---------------------------------------------------------------------------

/** Built-in scalar types understood by the notation and the binding. */
export type PrimitiveName =
  | "string"
  | "number"
  | "integer" // a number the library expects to be whole (zoom levels, pixels)
  | "boolean"
  | "void"
  | "object"
  | "unknown"
  | "null";

/** A parameter of a function type, a method or a constructor. */
export interface ParameterDescriptor {
  readonly name: string;
  readonly type: TypeRef;
  /** Whether the argument may be omitted. */
  readonly optional: boolean;
}

/**
 * Reference to a type, as used in member signatures.
 *
 * `named` references point into the registry by name and may be forward
 * references until the assembly is validated.
 */
export type TypeRef =
  | { readonly kind: "primitive"; readonly name: PrimitiveName }
  | { readonly kind: "host"; readonly name: string } // DOM types, e.g. "dom.HTMLElement"
  | { readonly kind: "literal"; readonly value: string }
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "array"; readonly element: TypeRef }
  | { readonly kind: "tuple"; readonly elements: readonly TypeRef[] }
  | { readonly kind: "union"; readonly variants: readonly TypeRef[] }
  | {
      readonly kind: "function";
      /** The callback's `this`; bindings hand it to the host handler as the first argument. */
      readonly self?: TypeRef;
      readonly params: readonly ParameterDescriptor[];
      readonly returns: TypeRef;
    };

// ---------------------------------------------------------------------------
// Forwards: how a generated member reaches the library
// ---------------------------------------------------------------------------

/** Call-forwarding convention attached to constructors and methods. */
export type Forward =
  | { readonly kind: "construct" } // new <Type>(...args)
  | { readonly kind: "object-literal"; readonly fields: readonly string[] } // { field: arg }
  | { readonly kind: "call"; readonly method: string } // target.method(...args)
  | { readonly kind: "subscribe"; readonly primitive: "on" | "once"; readonly event: string }
  | { readonly kind: "unsubscribe"; readonly event: string }
  | { readonly kind: "fire"; readonly event: string };

// ---------------------------------------------------------------------------
// Members
// ---------------------------------------------------------------------------

export interface ConstructorDescriptor {
  readonly kind: "constructor";
  readonly params: readonly ParameterDescriptor[];
  readonly description: string;
  readonly forward: Forward;
}

export interface MethodDescriptor {
  readonly kind: "method";
  readonly name: string;
  readonly params: readonly ParameterDescriptor[];
  readonly returns: TypeRef;
  readonly isStatic: boolean;
  readonly description: string;
  readonly forward: Forward;
}

/** JSON-compatible value used for documented option defaults. */
export type DefaultValue = string | number | boolean | null;

export interface PropertyDescriptor {
  readonly kind: "property";
  readonly name: string;
  readonly type: TypeRef;
  readonly access: "readonly" | "readwrite";
  readonly isStatic: boolean;
  readonly description: string;
  /** Default the library applies when an options field is left unset. */
  readonly defaultValue?: DefaultValue;
}

export type MemberDescriptor =
  | ConstructorDescriptor
  | MethodDescriptor
  | PropertyDescriptor;

// ---------------------------------------------------------------------------
// Types, events, aliases
// ---------------------------------------------------------------------------

export interface EventDescriptor {
  /** Literal event name passed to the library (e.g. `"mousemove"`). */
  readonly name: string;
  /** Payload type; always `Event` or a type inheriting from it. */
  readonly payload: TypeRef;
  readonly description: string;
}

/**
 * `class` and `interface` mirror the library; `options` marks a record of
 * optional, independently settable fields passed as a configuration bag.
 */
export type TypeKind = "class" | "interface" | "options";

export interface TypeDescriptor {
  readonly kind: TypeKind;
  /** Registry name relative to the library global, e.g. `"TileLayer.Options"`. */
  readonly name: string;
  readonly description: string;
  readonly inherits?: string;
  readonly implements: readonly string[];
  /** Types declared as contained in this one (usually its options record). */
  readonly nested: readonly string[];
  /** Constructors, methods and properties in declaration order. */
  readonly members: readonly MemberDescriptor[];
  readonly events: readonly EventDescriptor[];
}

/** A named sum type, e.g. `LatLngExpression = LatLng | [number, number]`. */
export interface AliasDescriptor {
  readonly kind: "alias";
  readonly name: string;
  readonly target: TypeRef;
  readonly description: string;
}

export type TypeEntry = TypeDescriptor | AliasDescriptor;

// ---------------------------------------------------------------------------
// Resources and the assembly
// ---------------------------------------------------------------------------

export interface ResourceDescriptor {
  readonly name: string;
  readonly kind: "stylesheet" | "script";
  readonly url: string;
  /** Names of resources that must be loaded first. */
  readonly dependsOn: readonly string[];
}

export interface Namespace<T> {
  readonly name: string;
  readonly entries: readonly T[];
}

/** The aggregate value handed to binding generators. */
export interface Assembly {
  /** Global the library installs itself under (`"L"` for Leaflet). */
  readonly library: string;
  readonly resources: Namespace<ResourceDescriptor>;
  readonly types: Namespace<TypeEntry>;
  /** Resources the generated bindings need on the page. */
  readonly requires: readonly string[];
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Full configuration object for {@link SurfaceAssembler}. */
export interface AssemblerConfig {
  /** Global name of the library namespace (default: `"L"`). */
  library: string;

  /** Leaflet release the definitions and CDN resources target (default: `"1.9.4"`). */
  leafletVersion: string;

  /**
   * CDN directory holding `leaflet.css` and `leaflet.js`. `{version}` is
   * replaced with {@link leafletVersion}
   * (default: `"https://unpkg.com/leaflet@{version}/dist"`).
   */
  cdnBaseUrl: string;

  /** Additional definition documents (plugins, local extensions). */
  extraDefinitions: unknown[];

  /** Run structural validation before returning the assembly (default: true). */
  validate: boolean;

  /** Logger for build progress (default: silent). */
  logger: Logger;
}
