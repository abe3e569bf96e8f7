/**
 * Assembly Validation
 * ===================
 * Structural checks run on a built {@link Assembly} before it is handed to a
 * binding generator:
 *
 * 1. event names are unique per type
 * 2. every event has exactly `on_`, `once_`, `off_` (×2) and `fire_` accessors
 * 3. every named type reference resolves, inheritance is acyclic, and event
 *    payloads extend `Event`
 * 4. every options record has a zero-argument constructor
 * 5. resource dependencies resolve and every script depends on a stylesheet
 */

import { ACCESSOR_PREFIXES, EVENT_BASE_TYPE, accessorName } from "./events.js";
import { AssemblyValidationError, type ValidationIssue } from "./errors.js";
import { referencedNames } from "./notation.js";
import type {
  Assembly,
  MethodDescriptor,
  TypeDescriptor,
  TypeEntry,
  TypeRef,
} from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isType(entry: TypeEntry): entry is TypeDescriptor {
  return entry.kind !== "alias";
}

/** Every named reference appearing anywhere on a type entry, with its location. */
function referencesOf(entry: TypeEntry): Array<{ name: string; where: string }> {
  const refs: Array<{ name: string; where: string }> = [];
  const add = (ref: TypeRef, where: string): void => {
    for (const name of referencedNames(ref)) refs.push({ name, where });
  };

  if (entry.kind === "alias") {
    add(entry.target, "alias target");
    return refs;
  }

  if (entry.inherits) refs.push({ name: entry.inherits, where: "inherits" });
  for (const name of entry.implements) refs.push({ name, where: "implements" });
  for (const name of entry.nested) refs.push({ name, where: "nested" });

  for (const member of entry.members) {
    if (member.kind === "property") {
      add(member.type, `property ${member.name}`);
      continue;
    }
    const label = member.kind === "constructor" ? "constructor" : `method ${member.name}`;
    for (const p of member.params) add(p.type, `${label}(${p.name})`);
    if (member.kind === "method") add(member.returns, `${label} return`);
  }
  for (const event of entry.events) add(event.payload, `event ${event.name}`);

  return refs;
}

/** Walk `inherits` from `start`; returns the chain, or null on a cycle. */
function ancestry(
  start: TypeDescriptor,
  byName: ReadonlyMap<string, TypeEntry>,
): string[] | null {
  const chain: string[] = [start.name];
  let current: TypeEntry | undefined = start;
  while (current && isType(current) && current.inherits) {
    if (chain.includes(current.inherits)) return null;
    chain.push(current.inherits);
    current = byName.get(current.inherits);
  }
  return chain;
}

function accessorCount(methods: readonly MethodDescriptor[], name: string, arity?: number): number {
  return methods.filter(
    (m) => m.name === name && (arity === undefined || m.params.length === arity),
  ).length;
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function checkEvents(
  type: TypeDescriptor,
  byName: ReadonlyMap<string, TypeEntry>,
  issues: ValidationIssue[],
): void {
  const seen = new Set<string>();
  for (const event of type.events) {
    if (seen.has(event.name)) {
      issues.push({
        code: "ERR_DUPLICATE_EVENT",
        subject: type.name,
        message: `event "${event.name}" is declared more than once`,
      });
    }
    seen.add(event.name);
  }

  const methods = type.members.filter((m): m is MethodDescriptor => m.kind === "method");
  for (const name of seen) {
    // [accessor, expected count, required arity]
    const expected = ACCESSOR_PREFIXES.map(
      (prefix): [string, number, number | undefined] => [
        accessorName(prefix, name),
        prefix === "off_" ? 2 : 1,
        undefined,
      ],
    );
    expected.push([accessorName("off_", name), 1, 1], [accessorName("off_", name), 1, 0]);

    for (const [accessor, count, arity] of expected) {
      const actual = accessorCount(methods, accessor, arity);
      if (actual !== count) {
        const shape = arity === undefined ? "" : ` with ${arity} parameter(s)`;
        issues.push({
          code: "ERR_EVENT_ACCESSORS",
          subject: type.name,
          message: `expected ${count} "${accessor}"${shape}, found ${actual}`,
        });
      }
    }
  }

  for (const event of type.events) {
    if (event.payload.kind !== "named") {
      issues.push({
        code: "ERR_EVENT_PAYLOAD",
        subject: type.name,
        message: `event "${event.name}" payload must name an Event type`,
      });
      continue;
    }
    const payload = byName.get(event.payload.name);
    if (!payload || !isType(payload)) continue; // reported as unresolved
    const chain = ancestry(payload, byName);
    if (chain && !chain.includes(EVENT_BASE_TYPE)) {
      issues.push({
        code: "ERR_EVENT_PAYLOAD",
        subject: type.name,
        message: `event "${event.name}" payload ${payload.name} does not extend ${EVENT_BASE_TYPE}`,
      });
    }
  }
}

function checkOptionsRecord(type: TypeDescriptor, issues: ValidationIssue[]): void {
  const hasEmpty = type.members.some((m) => m.kind === "constructor" && m.params.length === 0);
  if (!hasEmpty) {
    issues.push({
      code: "ERR_OPTIONS_CONSTRUCTOR",
      subject: type.name,
      message: "options record has no zero-argument constructor",
    });
  }
}

function checkResources(assembly: Assembly, issues: ValidationIssue[]): void {
  const resources = assembly.resources.entries;
  const byName = new Map(resources.map((r) => [r.name, r]));

  for (const resource of resources) {
    for (const dep of resource.dependsOn) {
      if (!byName.has(dep)) {
        issues.push({
          code: "ERR_RESOURCE_DEPENDENCY",
          subject: resource.name,
          message: `depends on unknown resource "${dep}"`,
        });
      }
    }
    if (resource.kind === "script") {
      const stylesheets = resources.filter((r) => r.kind === "stylesheet");
      const covered = stylesheets.every((s) => resource.dependsOn.includes(s.name));
      if (!covered) {
        issues.push({
          code: "ERR_RESOURCE_DEPENDENCY",
          subject: resource.name,
          message: "script must depend on every stylesheet resource",
        });
      }
    }
  }

  for (const name of assembly.requires) {
    if (!byName.has(name)) {
      issues.push({
        code: "ERR_RESOURCE_DEPENDENCY",
        subject: assembly.types.name,
        message: `requires unknown resource "${name}"`,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Collect every structural problem in `assembly`. An empty array means the
 * assembly is ready for hand-off.
 */
export function validateAssembly(assembly: Assembly): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const byName = new Map<string, TypeEntry>(assembly.types.entries.map((e) => [e.name, e]));

  for (const entry of assembly.types.entries) {
    for (const ref of referencesOf(entry)) {
      if (!byName.has(ref.name)) {
        issues.push({
          code: "ERR_UNRESOLVED_REFERENCE",
          subject: entry.name,
          message: `${ref.where} references unknown type "${ref.name}"`,
        });
      }
    }

    if (!isType(entry)) continue;

    if (ancestry(entry, byName) === null) {
      issues.push({
        code: "ERR_INHERITANCE_CYCLE",
        subject: entry.name,
        message: "inheritance chain loops back on itself",
      });
    }

    checkEvents(entry, byName, issues);
    if (entry.kind === "options") checkOptionsRecord(entry, issues);
  }

  checkResources(assembly, issues);
  return issues;
}

/**
 * Validate and throw on any issue.
 *
 * @throws {AssemblyValidationError} Listing every issue found.
 */
export function assertValidAssembly(assembly: Assembly): void {
  const issues = validateAssembly(assembly);
  if (issues.length > 0) {
    throw new AssemblyValidationError(issues);
  }
}
