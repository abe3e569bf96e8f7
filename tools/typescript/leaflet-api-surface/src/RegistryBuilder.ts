/**
 * RegistryBuilder
 * ===============
 * Two-phase registration of an API surface.
 *
 * Phase one declares every type identity (and alias) so that members may
 * reference types declared later; phase two attaches members and events.
 * {@link build} returns a deep-frozen {@link Assembly}.
 *
 * @example
 * ```ts
 * const builder = new RegistryBuilder({ library: "L" });
 * builder.declareType("LatLng", "class");
 * builder.defineType("LatLng", { members: [...] });
 * const assembly = builder.build();
 * ```
 */

import { augmentWithEvents } from "./events.js";
import { DefinitionError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  AliasDescriptor,
  Assembly,
  EventDescriptor,
  MemberDescriptor,
  ResourceDescriptor,
  TypeDescriptor,
  TypeEntry,
  TypeKind,
  TypeRef,
} from "./types.js";

/** Options for {@link RegistryBuilder}. */
export interface RegistryBuilderOptions {
  /** Global the library installs itself under. */
  library: string;
  /** Name of the type namespace in the assembly (default: `library`). */
  typeNamespace?: string;
  /** Name of the resource namespace (default: `` `${library}.Resources` ``). */
  resourceNamespace?: string;
  logger?: Logger;
}

/** Members and relationships attached to a declared type. */
export interface TypeDefinitionInput {
  description?: string;
  inherits?: string;
  implements?: string[];
  nested?: string[];
  members?: MemberDescriptor[];
}

interface PendingType {
  descriptor: TypeDescriptor;
  defined: boolean;
}

/** Recursively freeze a plain data graph. */
function freezeDeep<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeDeep(child);
    }
  }
  return value;
}

export class RegistryBuilder {
  private readonly library: string;
  private readonly typeNamespace: string;
  private readonly resourceNamespace: string;
  private readonly logger: Logger;

  // Insertion order is declaration order.
  private readonly entries = new Map<string, PendingType | AliasDescriptor>();
  private readonly resources = new Map<string, ResourceDescriptor>();
  private readonly requires: string[] = [];

  constructor(options: RegistryBuilderOptions) {
    this.library = options.library;
    this.typeNamespace = options.typeNamespace ?? options.library;
    this.resourceNamespace = options.resourceNamespace ?? `${options.library}.Resources`;
    this.logger = options.logger ?? silentLogger;
  }

  // -------------------------------------------------------------------------
  // Phase one
  // -------------------------------------------------------------------------

  /**
   * Declare a type identity. Returns a reference usable in signatures before
   * the type is defined.
   *
   * @throws {DefinitionError} `ERR_DUPLICATE_TYPE` if the name is taken.
   */
  public declareType(name: string, kind: TypeKind, description = ""): TypeRef {
    this.assertFree(name);
    this.entries.set(name, {
      defined: false,
      descriptor: {
        kind,
        name,
        description,
        implements: [],
        nested: [],
        members: [],
        events: [],
      },
    });
    return { kind: "named", name };
  }

  /**
   * Declare a named sum type. Aliases need no second phase.
   *
   * @throws {DefinitionError} `ERR_DUPLICATE_TYPE` if the name is taken.
   */
  public declareAlias(name: string, target: TypeRef, description = ""): TypeRef {
    this.assertFree(name);
    this.entries.set(name, { kind: "alias", name, target, description });
    return { kind: "named", name };
  }

  // -------------------------------------------------------------------------
  // Phase two
  // -------------------------------------------------------------------------

  /**
   * Attach members and relationships to a declared type.
   *
   * @throws {DefinitionError} `ERR_UNDECLARED_TYPE` or `ERR_DUPLICATE_DEFINITION`.
   */
  public defineType(name: string, input: TypeDefinitionInput): void {
    const pending = this.pending(name);
    if (pending.defined) {
      throw new DefinitionError(
        `RegistryBuilder: type "${name}" is already defined.`,
        "ERR_DUPLICATE_DEFINITION",
        { typeName: name },
      );
    }

    const current = pending.descriptor;
    pending.descriptor = {
      ...current,
      description: input.description ?? current.description,
      inherits: input.inherits,
      implements: input.implements ?? [],
      nested: input.nested ?? [],
      members: [...(input.members ?? []), ...current.members],
    };
    pending.defined = true;
    this.logger.debug("Defined type", { name, members: pending.descriptor.members.length });
  }

  /**
   * Add events (and their derived accessors) to a declared type.
   *
   * @throws {DefinitionError} `ERR_UNDECLARED_TYPE` or `ERR_DUPLICATE_EVENT`.
   */
  public addEvents(name: string, events: readonly EventDescriptor[]): void {
    const pending = this.pending(name);
    pending.descriptor = augmentWithEvents(pending.descriptor, events);
  }

  /**
   * Register a web resource the bindings depend on.
   *
   * @param required - Whether the generated bindings require it directly.
   * @throws {DefinitionError} `ERR_DUPLICATE_RESOURCE` if the name is taken.
   */
  public addResource(resource: ResourceDescriptor, required = false): void {
    if (this.resources.has(resource.name)) {
      throw new DefinitionError(
        `RegistryBuilder: resource "${resource.name}" is already registered.`,
        "ERR_DUPLICATE_RESOURCE",
        { resource: resource.name },
      );
    }
    this.resources.set(resource.name, resource);
    if (required) this.requires.push(resource.name);
  }

  /** Whether `name` has been declared (as a type or alias). */
  public has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Finish registration.
   *
   * @throws {DefinitionError} `ERR_UNDEFINED_TYPE` if a declared type never
   *   received its definition.
   */
  public build(): Assembly {
    const types: TypeEntry[] = [];
    for (const entry of this.entries.values()) {
      if ("kind" in entry) {
        types.push(entry);
        continue;
      }
      if (!entry.defined) {
        throw new DefinitionError(
          `RegistryBuilder: type "${entry.descriptor.name}" was declared but never defined.`,
          "ERR_UNDEFINED_TYPE",
          { typeName: entry.descriptor.name },
        );
      }
      types.push(entry.descriptor);
    }

    this.logger.debug("Registry built", {
      types: types.length,
      resources: this.resources.size,
    });

    return freezeDeep<Assembly>({
      library: this.library,
      resources: { name: this.resourceNamespace, entries: [...this.resources.values()] },
      types: { name: this.typeNamespace, entries: types },
      requires: [...this.requires],
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private assertFree(name: string): void {
    if (this.entries.has(name)) {
      throw new DefinitionError(
        `RegistryBuilder: type "${name}" is already declared.`,
        "ERR_DUPLICATE_TYPE",
        { typeName: name },
      );
    }
  }

  private pending(name: string): PendingType {
    const entry = this.entries.get(name);
    if (!entry || "kind" in entry) {
      throw new DefinitionError(
        `RegistryBuilder: type "${name}" must be declared before it is defined.`,
        "ERR_UNDECLARED_TYPE",
        { typeName: name },
      );
    }
    return entry;
  }
}
