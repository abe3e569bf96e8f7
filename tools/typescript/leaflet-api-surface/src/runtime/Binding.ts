/**
 * Binding
 * =======
 * Drives a live library object graph through an {@link Assembly}.
 *
 * Every call goes through the registry: members are looked up on the type
 * and its ancestors, overloads are chosen by arity and then by the runtime
 * shape of each argument, and the member's forward decides what reaches
 * the library. Event accessors become `on` / `once` / `off` / `fire` calls
 * with the literal event name.
 *
 * @example
 * ```typescript
 * import * as L from "leaflet";
 *
 * const binding = new Binding(buildLeafletAssembly(), L);
 * const map = binding.construct("Map", "map");
 * map.invoke("setView", [51.505, -0.09], 13);
 * map.invoke("on_click", (self, event) => {
 *   console.log(event.get("latlng"));
 * });
 * ```
 */

import { BindingError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { formatTypeRef } from "../notation.js";
import type {
  Assembly,
  ConstructorDescriptor,
  Forward,
  MemberDescriptor,
  MethodDescriptor,
  ParameterDescriptor,
  PrimitiveName,
  PropertyDescriptor,
  TypeDescriptor,
  TypeEntry,
  TypeRef,
} from "../types.js";

/** A library object seen through its registry type. */
export interface BoundObject {
  /** Registry name of the type the object is bound as. */
  readonly typeName: string;
  /** The underlying library object. */
  readonly target: object;
  /** Call a method or event accessor, e.g. `invoke("on_click", handler)`. */
  invoke(member: string, ...args: unknown[]): unknown;
  /** Read a declared property. */
  get(property: string): unknown;
  /** Write a declared read-write property. */
  set(property: string, value: unknown): void;
}

export interface BindingOptions {
  logger?: Logger;
}

type HostFunction = (...args: unknown[]) => unknown;
type FunctionRef = Extract<TypeRef, { kind: "function" }>;
type Invocable = ConstructorDescriptor | MethodDescriptor;

function isCallable(value: unknown): value is HostFunction {
  return typeof value === "function";
}

function isObject(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** An object literal, as opposed to an instance of some class. */
function isLiteralRecord(value: unknown): value is Record<string, unknown> {
  if (!isPlainRecord(value)) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function isInstance(value: unknown, ctor: unknown): boolean {
  if (!isCallable(ctor) || !isObject(value)) return false;
  const prototype: unknown = Reflect.get(ctor, "prototype");
  return isObject(prototype) && value instanceof ctor;
}

/** Follow a dotted path from `root`; `undefined` once a segment is missing. */
function lookupPath(root: object, path: string): unknown {
  let current: unknown = root;
  for (const segment of path.split(".")) {
    if (!isObject(current) || !(segment in current)) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

function matchesPrimitive(value: unknown, name: PrimitiveName): boolean {
  switch (name) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number";
    case "integer":
      return Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "void":
      return value === undefined;
    case "null":
      return value === null;
    case "object":
      return isObject(value);
    case "unknown":
      return true;
  }
}

function isType(entry: TypeEntry | undefined): entry is TypeDescriptor {
  return entry !== undefined && entry.kind !== "alias";
}

// ---------------------------------------------------------------------------
// BoundHandle
// ---------------------------------------------------------------------------

class BoundHandle implements BoundObject {
  constructor(
    private readonly binding: Binding,
    public readonly typeName: string,
    public readonly target: object,
  ) {}

  public invoke(member: string, ...args: unknown[]): unknown {
    return this.binding.invokeMember(this, member, args);
  }

  public get(property: string): unknown {
    return this.binding.readProperty(this, property);
  }

  public set(property: string, value: unknown): void {
    this.binding.writeProperty(this, property, value);
  }
}

// ---------------------------------------------------------------------------
// Binding class
// ---------------------------------------------------------------------------

export class Binding {
  private readonly entries: ReadonlyMap<string, TypeEntry>;
  private readonly logger: Logger;

  private readonly bound = new WeakMap<object, BoundHandle>();
  // handler -> function type -> wrapper handed to the library
  private readonly callbacks = new WeakMap<HostFunction, Map<string, HostFunction>>();
  private constructors: Array<{ name: string; ctor: unknown }> | null = null;

  /**
   * @param assembly - Validated assembly describing the library.
   * @param library - The library namespace object (`L`).
   */
  constructor(
    private readonly assembly: Assembly,
    private readonly library: object,
    options: BindingOptions = {},
  ) {
    this.entries = new Map(assembly.types.entries.map((e) => [e.name, e]));
    this.logger = options.logger ?? silentLogger;
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Create an instance of a registry type. Options records produce a bound
   * plain object; classes call the library constructor.
   *
   * @throws {BindingError} `ERR_UNKNOWN_TYPE`, `ERR_NO_OVERLOAD` or `ERR_LIBRARY_PATH`.
   */
  public construct(typeName: string, ...args: unknown[]): BoundObject {
    const type = this.typeOf(typeName);
    const ctors = type.members.filter(
      (m): m is ConstructorDescriptor => m.kind === "constructor",
    );
    const ctor = this.resolveOverload(typeName, "constructor", ctors, args);
    const hostArgs = this.toHostArgs(ctor.params, args);

    let target: unknown;
    if (ctor.forward.kind === "object-literal") {
      target = Object.fromEntries(
        ctor.forward.fields
          .map((field, i): [string, unknown] => [field, hostArgs[i]])
          .filter(([, value]) => value !== undefined),
      );
    } else {
      target = Reflect.construct(this.resolveCallable(typeName), hostArgs);
    }

    if (!isObject(target)) {
      throw new BindingError(
        `Binding: constructor of ${typeName} did not return an object.`,
        "ERR_LIBRARY_PATH",
        { typeName },
      );
    }
    this.logger.debug("Constructed", { typeName, arity: args.length });
    return this.wrap(target, typeName);
  }

  /**
   * Call a static method, e.g. `invokeStatic("GeoJSON", "coordsToLatLng", [1, 2])`.
   *
   * @throws {BindingError} `ERR_UNKNOWN_MEMBER`, `ERR_NO_OVERLOAD` or `ERR_LIBRARY_PATH`.
   */
  public invokeStatic(typeName: string, member: string, ...args: unknown[]): unknown {
    const methods = this.findMembers(typeName, (m): m is MethodDescriptor =>
      m.kind === "method" && m.isStatic && m.name === member,
    );
    const method = this.resolveOverload(typeName, member, methods, args);
    return this.forward(this.resolveObject(typeName), typeName, method, args);
  }

  /** Read a static property, e.g. `getStatic("CRS", "EPSG3857")`. */
  public getStatic(typeName: string, property: string): unknown {
    const prop = this.requireProperty(typeName, property, true);
    return this.fromHost(Reflect.get(this.resolveObject(typeName), property), prop.type);
  }

  /** Write a static read-write property, e.g. `Icon.Default.imagePath`. */
  public setStatic(typeName: string, property: string, value: unknown): void {
    const prop = this.requireWritable(typeName, property, value, true);
    Reflect.set(this.resolveObject(typeName), property, this.toHost(value, prop.type));
  }

  /**
   * View an existing library object as `typeName` (or a more specific
   * registry class it is an instance of). Wrappers are cached per object.
   */
  public wrap(target: object, typeName: string): BoundObject {
    if (this.isBound(target)) return target;
    const cached = this.bound.get(target);
    if (cached) return cached;
    this.typeOf(typeName);
    const handle = new BoundHandle(this, this.mostSpecificType(target, typeName), target);
    this.bound.set(target, handle);
    return handle;
  }

  /** Whether `value` is a wrapper produced by this binding. */
  public isBound(value: unknown): value is BoundObject {
    return value instanceof BoundHandle && this.bound.get(value.target) === value;
  }

  /** Whether `from` is `to` or inherits or implements it. */
  public isAssignable(from: string, to: string): boolean {
    if (from === to) return true;
    return this.lineage(from).some((t) => t.name === to || t.implements.includes(to));
  }

  // ------------------------------------------------------------------
  // Instance members (called by BoundHandle)
  // ------------------------------------------------------------------

  /** @internal */
  public invokeMember(self: BoundHandle, member: string, args: unknown[]): unknown {
    const methods = this.findMembers(self.typeName, (m): m is MethodDescriptor =>
      m.kind === "method" && !m.isStatic && m.name === member,
    );
    const method = this.resolveOverload(self.typeName, member, methods, args);
    return this.forward(self.target, self.typeName, method, args);
  }

  /** @internal */
  public readProperty(self: BoundHandle, property: string): unknown {
    const prop = this.requireProperty(self.typeName, property, false);
    return this.fromHost(Reflect.get(self.target, property), prop.type);
  }

  /** @internal */
  public writeProperty(self: BoundHandle, property: string, value: unknown): void {
    const prop = this.requireWritable(self.typeName, property, value, false);
    Reflect.set(self.target, property, this.toHost(value, prop.type));
  }

  // ------------------------------------------------------------------
  // Forwards
  // ------------------------------------------------------------------

  private forward(
    target: object,
    typeName: string,
    method: MethodDescriptor,
    args: unknown[],
  ): unknown {
    const hostArgs = this.toHostArgs(method.params, args);
    const f: Forward = method.forward;
    this.logger.debug("Forward", { typeName, member: method.name, forward: f.kind });

    switch (f.kind) {
      case "call": {
        const result = this.callHost(target, typeName, f.method, hostArgs);
        return this.fromHost(result, method.returns);
      }
      case "subscribe":
        this.callHost(target, typeName, f.primitive, [f.event, ...hostArgs]);
        return undefined;
      case "unsubscribe":
        this.callHost(target, typeName, "off", [f.event, ...hostArgs]);
        return undefined;
      case "fire":
        this.callHost(target, typeName, "fire", [f.event, ...hostArgs]);
        return undefined;
      case "construct":
      case "object-literal":
        throw new BindingError(
          `Binding: ${typeName}.${method.name} has a constructor forward.`,
          "ERR_UNKNOWN_MEMBER",
          { typeName, member: method.name },
        );
    }
  }

  private callHost(target: object, typeName: string, name: string, args: unknown[]): unknown {
    const fn: unknown = Reflect.get(target, name);
    if (!isCallable(fn)) {
      throw new BindingError(
        `Binding: the library object for ${typeName} has no method "${name}".`,
        "ERR_LIBRARY_PATH",
        { typeName, member: name },
      );
    }
    return Reflect.apply(fn, target, args);
  }

  // ------------------------------------------------------------------
  // Registry lookup
  // ------------------------------------------------------------------

  private typeOf(typeName: string): TypeDescriptor {
    const entry = this.entries.get(typeName);
    if (!isType(entry)) {
      throw new BindingError(
        `Binding: "${typeName}" is not a type in ${this.assembly.types.name}.`,
        "ERR_UNKNOWN_TYPE",
        { typeName },
      );
    }
    return entry;
  }

  /** The type followed by its ancestors; stops at unknown names or cycles. */
  private lineage(typeName: string): TypeDescriptor[] {
    const chain: TypeDescriptor[] = [];
    let entry = this.entries.get(typeName);
    while (isType(entry) && !chain.includes(entry)) {
      chain.push(entry);
      entry = entry.inherits ? this.entries.get(entry.inherits) : undefined;
    }
    return chain;
  }

  /**
   * Members matching `pick`, taken from the nearest type that declares any:
   * the type itself, then its ancestors, then the interfaces they implement.
   */
  private findMembers<M extends MethodDescriptor | PropertyDescriptor>(
    typeName: string,
    pick: (m: MemberDescriptor) => m is M,
  ): M[] {
    const chain = this.lineage(typeName);
    const interfaces = chain.flatMap((t) => t.implements.flatMap((name) => this.lineage(name)));
    for (const type of [...chain, ...interfaces]) {
      const found = type.members.filter(pick);
      if (found.length > 0) return found;
    }
    return [];
  }

  private requireProperty(typeName: string, property: string, isStatic: boolean): PropertyDescriptor {
    this.typeOf(typeName);
    const [prop] = this.findMembers(typeName, (m): m is PropertyDescriptor =>
      m.kind === "property" && m.isStatic === isStatic && m.name === property,
    );
    if (!prop) {
      throw new BindingError(
        `Binding: ${typeName} has no ${isStatic ? "static " : ""}property "${property}".`,
        "ERR_UNKNOWN_MEMBER",
        { typeName, member: property },
      );
    }
    return prop;
  }

  private requireWritable(
    typeName: string,
    property: string,
    value: unknown,
    isStatic: boolean,
  ): PropertyDescriptor {
    const prop = this.requireProperty(typeName, property, isStatic);
    if (prop.access !== "readwrite") {
      throw new BindingError(
        `Binding: ${typeName}.${property} is read-only.`,
        "ERR_UNKNOWN_MEMBER",
        { typeName, member: property },
      );
    }
    if (!this.matches(value, prop.type)) {
      throw new BindingError(
        `Binding: value for ${typeName}.${property} is not a ${formatTypeRef(prop.type)}.`,
        "ERR_NO_OVERLOAD",
        { typeName, member: property },
      );
    }
    return prop;
  }

  private resolveOverload<M extends Invocable>(
    typeName: string,
    member: string,
    candidates: readonly M[],
    args: readonly unknown[],
  ): M {
    if (candidates.length === 0) {
      throw new BindingError(
        `Binding: ${typeName} has no member "${member}".`,
        "ERR_UNKNOWN_MEMBER",
        { typeName, member },
      );
    }

    const fits = (params: readonly ParameterDescriptor[]): boolean => {
      const required = params.filter((p) => !p.optional).length;
      if (args.length < required || args.length > params.length) return false;
      return params.every((p, i) => {
        const value = args[i];
        if (value === undefined && p.optional) return true;
        return this.matches(value, p.type);
      });
    };

    const chosen = candidates.find((c) => fits(c.params));
    if (!chosen) {
      throw new BindingError(
        `Binding: no overload of ${typeName}.${member} accepts ${args.length} argument(s) of these types.`,
        "ERR_NO_OVERLOAD",
        {
          typeName,
          member,
          arity: args.length,
          signatures: candidates.map((c) => c.params.map((p) => formatTypeRef(p.type)).join(", ")),
        },
      );
    }
    return chosen;
  }

  // ------------------------------------------------------------------
  // Library lookup
  // ------------------------------------------------------------------

  private resolveObject(typeName: string): object {
    const value = lookupPath(this.library, typeName);
    if (!isObject(value)) {
      throw new BindingError(
        `Binding: ${this.assembly.library}.${typeName} is not defined by the library.`,
        "ERR_LIBRARY_PATH",
        { typeName },
      );
    }
    return value;
  }

  private resolveCallable(typeName: string): HostFunction {
    const value = this.resolveObject(typeName);
    if (!isCallable(value)) {
      throw new BindingError(
        `Binding: ${this.assembly.library}.${typeName} is not a constructor.`,
        "ERR_LIBRARY_PATH",
        { typeName },
      );
    }
    return value;
  }

  /** Library constructors of every class type, resolved once. */
  private libraryConstructors(): Array<{ name: string; ctor: unknown }> {
    if (!this.constructors) {
      this.constructors = [];
      for (const entry of this.entries.values()) {
        if (entry.kind !== "class") continue;
        const ctor = lookupPath(this.library, entry.name);
        if (isCallable(ctor)) this.constructors.push({ name: entry.name, ctor });
      }
    }
    return this.constructors;
  }

  private mostSpecificType(target: object, declared: string): string {
    let best = declared;
    let depth = this.lineage(declared).length;
    for (const { name, ctor } of this.libraryConstructors()) {
      if (!isInstance(target, ctor) || !this.isAssignable(name, declared)) continue;
      const d = this.lineage(name).length;
      if (d > depth) {
        best = name;
        depth = d;
      }
    }
    return best;
  }

  // ------------------------------------------------------------------
  // Runtime type matching
  // ------------------------------------------------------------------

  private matches(value: unknown, ref: TypeRef): boolean {
    switch (ref.kind) {
      case "primitive":
        return matchesPrimitive(value, ref.name);
      case "host": {
        const ctor: unknown = Reflect.get(globalThis, ref.name.slice("dom.".length));
        return isCallable(ctor) ? isInstance(value, ctor) : isObject(value);
      }
      case "literal":
        return value === ref.value;
      case "array":
        return Array.isArray(value) && value.every((v) => this.matches(v, ref.element));
      case "tuple":
        return (
          Array.isArray(value) &&
          value.length === ref.elements.length &&
          ref.elements.every((e, i) => this.matches(value[i], e))
        );
      case "union":
        return ref.variants.some((v) => this.matches(value, v));
      case "function":
        return isCallable(value);
      case "named":
        return this.matchesNamed(value, ref.name);
    }
  }

  private matchesNamed(value: unknown, name: string): boolean {
    const entry = this.entries.get(name);
    if (!entry) return false;
    if (entry.kind === "alias") return this.matches(value, entry.target);

    if (this.isBound(value)) return this.isAssignable(value.typeName, name);
    if (entry.kind !== "class") return isPlainRecord(value);

    // Without a constructor to test against, any non-array object passes;
    // coordinate tuples must fall through to the tuple variants.
    const known = this.libraryConstructors().find((c) => c.name === name);
    return known ? isInstance(value, known.ctor) : isObject(value) && !Array.isArray(value);
  }

  // ------------------------------------------------------------------
  // Conversion: caller -> library
  // ------------------------------------------------------------------

  private toHostArgs(params: readonly ParameterDescriptor[], args: readonly unknown[]): unknown[] {
    return args.map((arg, i) => {
      const param = params[i];
      return param ? this.toHost(arg, param.type) : this.unwrap(arg);
    });
  }

  private unwrap(value: unknown): unknown {
    return this.isBound(value) ? value.target : value;
  }

  private toHost(value: unknown, ref: TypeRef): unknown {
    if (this.isBound(value)) return value.target;

    switch (ref.kind) {
      case "function":
        return isCallable(value) ? this.hostCallback(value, ref) : value;
      case "array":
        return Array.isArray(value) ? value.map((v) => this.toHost(v, ref.element)) : value;
      case "tuple":
        return Array.isArray(value)
          ? value.map((v, i) => {
              const element = ref.elements[i];
              return element ? this.toHost(v, element) : this.unwrap(v);
            })
          : value;
      case "union": {
        const variant = ref.variants.find((v) => this.matches(value, v));
        return variant ? this.toHost(value, variant) : value;
      }
      case "named": {
        const entry = this.entries.get(ref.name);
        if (entry?.kind === "alias") return this.toHost(value, entry.target);
        if (entry?.kind === "options" && isPlainRecord(value)) {
          return this.recordToHost(value, entry.name);
        }
        // Event payloads written as literals; interface implementations keep their identity.
        if (entry?.kind === "class" && isLiteralRecord(value)) {
          return this.recordToHost(value, entry.name);
        }
        return value;
      }
      default:
        return value;
    }
  }

  private recordToHost(record: Record<string, unknown>, typeName: string): Record<string, unknown> {
    return Object.fromEntries(
      Object.entries(record).map(([key, v]): [string, unknown] => {
        const [prop] = this.findMembers(typeName, (m): m is PropertyDescriptor =>
          m.kind === "property" && m.name === key,
        );
        return [key, prop ? this.toHost(v, prop.type) : this.unwrap(v)];
      }),
    );
  }

  /**
   * The function handed to the library for `handler` under `ref`. The same
   * pair always yields the same function, so removal by handler works.
   */
  private hostCallback(handler: HostFunction, ref: FunctionRef): HostFunction {
    const key = formatTypeRef(ref);
    let byType = this.callbacks.get(handler);
    if (!byType) {
      byType = new Map();
      this.callbacks.set(handler, byType);
    }

    const existing = byType.get(key);
    if (existing) return existing;

    const binding = this;
    const wrapper = function (this: unknown, ...args: unknown[]): unknown {
      const converted = args.map((arg, i) => {
        const param = ref.params[i];
        return param ? binding.fromHost(arg, param.type) : arg;
      });
      const callArgs = ref.self ? [binding.fromHost(this, ref.self), ...converted] : converted;
      return binding.toHost(Reflect.apply(handler, undefined, callArgs), ref.returns);
    };
    byType.set(key, wrapper);
    return wrapper;
  }

  // ------------------------------------------------------------------
  // Conversion: library -> caller
  // ------------------------------------------------------------------

  private fromHost(value: unknown, ref: TypeRef): unknown {
    if (this.isBound(value)) return value;
    switch (ref.kind) {
      case "named": {
        const entry = this.entries.get(ref.name);
        if (entry?.kind === "alias") return this.fromHost(value, entry.target);
        if (entry && entry.kind !== "options" && isObject(value) && !isCallable(value)) {
          return this.wrap(value, entry.name);
        }
        return value;
      }
      case "array":
        return Array.isArray(value) ? value.map((v) => this.fromHost(v, ref.element)) : value;
      case "tuple":
        return Array.isArray(value)
          ? value.map((v, i) => {
              const element = ref.elements[i];
              return element ? this.fromHost(v, element) : v;
            })
          : value;
      case "union": {
        const variant = ref.variants.find((v) => this.matches(value, v));
        return variant ? this.fromHost(value, variant) : value;
      }
      default:
        return value;
    }
  }
}
