/**
 * Event Accessors
 * ===============
 * Derives the per-event accessor members of an evented type.
 *
 * For every event `name` the type gains `on_<name>`, `once_<name>`,
 * `off_<name>` (with and without a handler) and `fire_<name>`, each
 * forwarding to the library's generic primitive with the literal event name.
 *
 * @example
 * ```ts
 * const map = augmentWithEvents(mapType, [
 *   { name: "mousemove", payload: named("MouseEvent"), description: "Mouse moved." },
 * ]);
 * // map.members now contains on_mousemove, once_mousemove, off_mousemove ×2, fire_mousemove
 * ```
 */

import { DefinitionError } from "./errors.js";
import type {
  EventDescriptor,
  MemberDescriptor,
  MethodDescriptor,
  ParameterDescriptor,
  TypeDescriptor,
  TypeRef,
} from "./types.js";

/** Prefixes of the four derived accessors, in the order they are added. */
export const ACCESSOR_PREFIXES = ["on_", "once_", "off_", "fire_"] as const;

export type AccessorPrefix = (typeof ACCESSOR_PREFIXES)[number];

/** Name of the base payload type every event payload must extend. */
export const EVENT_BASE_TYPE = "Event";

/** Name of a derived accessor: `accessorName("on_", "click") === "on_click"`. */
export function accessorName(prefix: AccessorPrefix, event: string): string {
  return prefix + event;
}

// ---------------------------------------------------------------------------
// Signature helpers
// ---------------------------------------------------------------------------

const VOID: TypeRef = { kind: "primitive", name: "void" };
const STRING: TypeRef = { kind: "primitive", name: "string" };
const BOOLEAN: TypeRef = { kind: "primitive", name: "boolean" };
const OBJECT: TypeRef = { kind: "primitive", name: "object" };

function named(name: string): TypeRef {
  return { kind: "named", name };
}

function param(name: string, type: TypeRef, optional = false): ParameterDescriptor {
  return { name, type, optional };
}

/** `(this: Self, event: Payload) => void` */
function handlerType(self: string, payload: TypeRef): TypeRef {
  return {
    kind: "function",
    self: named(self),
    params: [param("event", payload)],
    returns: VOID,
  };
}

function method(
  name: string,
  params: ParameterDescriptor[],
  returns: TypeRef,
  description: string,
  forward: MethodDescriptor["forward"] = { kind: "call", method: name },
): MethodDescriptor {
  return { kind: "method", name, params, returns, isStatic: false, description, forward };
}

// ---------------------------------------------------------------------------
// Generic (string-keyed) primitives
// ---------------------------------------------------------------------------

/**
 * The string-keyed event primitives every evented type exposes. Kept as the
 * escape hatch for events the per-event accessors do not enumerate.
 */
export function genericEventMembers(typeName: string): MethodDescriptor[] {
  const fn = handlerType(typeName, named(EVENT_BASE_TYPE));
  const type = param("type", STRING);
  const listener = param("fn", fn);
  const optionalListener = param("fn", fn, true);
  const context = param("context", OBJECT, true);
  const eventMap = param("eventMap", OBJECT);
  const data = param("data", OBJECT, true);
  const propagate = param("propagate", BOOLEAN, true);

  const subscribe = "Adds a listener for the given (space-separated) event types.";
  const subscribeMap = "Adds a set of type/listener pairs, e.g. {click: onClick, mousemove: onMouseMove}.";
  const subscribeOnce = "Same as on, but the listener is removed after its first invocation.";
  const unsubscribe = "Removes a listener; without a listener, removes every listener of the event type.";
  const unsubscribeMap = "Removes a set of type/listener pairs.";
  const unsubscribeAll = "Removes all listeners of all events on the object.";
  const fire = "Fires an event of the given type; data properties are copied onto the event object.";
  const has = "Returns true if the event type has listeners attached.";

  return [
    method("on", [type, listener, context], VOID, subscribe),
    method("on", [eventMap, context], VOID, subscribeMap),
    method("once", [type, listener, context], VOID, subscribeOnce),
    method("once", [eventMap, context], VOID, subscribeMap),
    method("off", [type, optionalListener, context], VOID, unsubscribe),
    method("off", [eventMap, context], VOID, unsubscribeMap),
    method("off", [], VOID, unsubscribeAll),
    method("fire", [type, data, propagate], VOID, fire),
    method("listens", [type, propagate], BOOLEAN, has),
    method("addEventListener", [type, listener, context], VOID, subscribe),
    method("addEventListener", [eventMap, context], VOID, subscribeMap),
    method("addOneTimeEventListener", [type, listener, context], VOID, subscribeOnce),
    method("removeEventListener", [type, optionalListener, context], VOID, unsubscribe),
    method("removeEventListener", [eventMap, context], VOID, unsubscribeMap),
    method("removeEventListener", [], VOID, unsubscribeAll),
    method("hasEventListeners", [type], BOOLEAN, has),
    method("fireEvent", [type, data, propagate], VOID, fire),
    method("clearAllEventListeners", [], VOID, unsubscribeAll),
  ];
}

// ---------------------------------------------------------------------------
// Derived accessors
// ---------------------------------------------------------------------------

/** The five members (four names, `off_` overloaded) derived for one event. */
export function eventAccessors(typeName: string, event: EventDescriptor): MethodDescriptor[] {
  const handler = param("handler", handlerType(typeName, event.payload));
  const { name, description } = event;

  return [
    method(accessorName("on_", name), [handler], VOID, description, {
      kind: "subscribe",
      primitive: "on",
      event: name,
    }),
    method(accessorName("once_", name), [handler], VOID, description, {
      kind: "subscribe",
      primitive: "once",
      event: name,
    }),
    method(accessorName("off_", name), [handler], VOID, description, {
      kind: "unsubscribe",
      event: name,
    }),
    method(accessorName("off_", name), [], VOID, description, {
      kind: "unsubscribe",
      event: name,
    }),
    method(accessorName("fire_", name), [param("payload", event.payload)], VOID, description, {
      kind: "fire",
      event: name,
    }),
  ];
}

function hasGenericPrimitives(members: readonly MemberDescriptor[]): boolean {
  return members.some((m) => m.kind === "method" && m.name === "on" && m.forward.kind === "call");
}

/**
 * Return a copy of `base` carrying `events` and their derived accessors.
 *
 * The generic primitives are added the first time a type is augmented;
 * later calls only append accessors for the new events.
 *
 * @throws {DefinitionError} `ERR_DUPLICATE_EVENT` if an event name repeats
 *   within `events` or collides with an event `base` already declares.
 */
export function augmentWithEvents(
  base: TypeDescriptor,
  events: readonly EventDescriptor[],
): TypeDescriptor {
  const seen = new Set(base.events.map((e) => e.name));
  for (const event of events) {
    if (seen.has(event.name)) {
      throw new DefinitionError(
        `Events: duplicate event "${event.name}" on ${base.name}.`,
        "ERR_DUPLICATE_EVENT",
        { typeName: base.name, event: event.name },
      );
    }
    seen.add(event.name);
  }

  const members: MemberDescriptor[] = [...base.members];
  if (!hasGenericPrimitives(members)) {
    members.push(...genericEventMembers(base.name));
  }
  for (const event of events) {
    members.push(...eventAccessors(base.name, event));
  }

  return { ...base, members, events: [...base.events, ...events] };
}
