/**
 * Definition Loader
 * =================
 * Validates definition documents against {@link definitionFileSchema} and
 * registers them on a {@link RegistryBuilder}.
 *
 * All files are declared before any is defined, so a member in one file may
 * reference a type from a file loaded after it.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";

import { DefinitionError, NotationError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { parseParameter, parseType } from "../notation.js";
import type { RegistryBuilder } from "../RegistryBuilder.js";
import type {
  ConstructorDescriptor,
  EventDescriptor,
  MemberDescriptor,
  ParameterDescriptor,
  TypeRef,
} from "../types.js";
import {
  definitionFileSchema,
  type ConstructorDefinition,
  type DefinitionFile,
  type TypeDefinition,
} from "./schema.js";

// Compiled once per process.
let validator: ValidateFunction<DefinitionFile> | null = null;

function getValidator(): ValidateFunction<DefinitionFile> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
    validator = ajv.compile<DefinitionFile>(definitionFileSchema);
  }
  return validator;
}

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
}

/**
 * Check a raw document against the definition schema.
 *
 * @param label - Used in the error message (file name, plugin name).
 * @throws {DefinitionError} `ERR_INVALID_DEFINITION_FILE` listing every schema violation.
 */
export function parseDefinitionFile(data: unknown, label = "definition file"): DefinitionFile {
  const validate = getValidator();
  if (!validate(data)) {
    const problems = describeErrors(validate.errors);
    throw new DefinitionError(
      `Definitions: ${label} does not match the schema:\n  ${problems.join("\n  ")}`,
      "ERR_INVALID_DEFINITION_FILE",
      { file: label, problems },
    );
  }
  return data;
}

// ---------------------------------------------------------------------------
// Notation with location
// ---------------------------------------------------------------------------

function located<T>(where: string, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof NotationError) {
      throw new DefinitionError(
        `Definitions: ${where}: ${err.message}`,
        "ERR_INVALID_DEFINITION_FILE",
        { where, ...err.context },
      );
    }
    throw err;
  }
}

function typeAt(where: string, source: string): TypeRef {
  return located(where, () => parseType(source));
}

function paramsAt(where: string, sources: string[] = []): ParameterDescriptor[] {
  return sources.map((s) => located(where, () => parseParameter(s)));
}

// ---------------------------------------------------------------------------
// Members
// ---------------------------------------------------------------------------

function constructorOf(
  type: TypeDefinition,
  def: ConstructorDefinition,
): ConstructorDescriptor {
  const params = paramsAt(`${type.name} constructor`, def.params);
  if (type.kind === "options") {
    return {
      kind: "constructor",
      params,
      description: def.description ?? "",
      forward: { kind: "object-literal", fields: def.fields ?? params.map((p) => p.name) },
    };
  }
  return {
    kind: "constructor",
    params,
    description: def.description ?? "",
    forward: { kind: "construct" },
  };
}

function membersOf(type: TypeDefinition): MemberDescriptor[] {
  const members: MemberDescriptor[] = [];
  const constructors = (type.constructors ?? []).map((c) => constructorOf(type, c));

  // An empty options value must always be constructible.
  if (type.kind === "options" && !constructors.some((c) => c.params.length === 0)) {
    members.push({
      kind: "constructor",
      params: [],
      description: `Creates an empty ${type.name}; unset fields keep the library defaults.`,
      forward: { kind: "object-literal", fields: [] },
    });
  }
  members.push(...constructors);

  for (const prop of type.properties ?? []) {
    members.push({
      kind: "property",
      name: prop.name,
      type: typeAt(`${type.name}.${prop.name}`, prop.type),
      access: prop.access ?? (type.kind === "options" ? "readwrite" : "readonly"),
      isStatic: prop.static ?? false,
      description: prop.description ?? "",
      ...(prop.default !== undefined ? { defaultValue: prop.default } : {}),
    });
  }

  for (const m of type.methods ?? []) {
    const where = `${type.name}.${m.name}`;
    members.push({
      kind: "method",
      name: m.name,
      params: paramsAt(where, m.params),
      returns: typeAt(where, m.returns ?? "void"),
      isStatic: m.static ?? false,
      description: m.description ?? "",
      forward: { kind: "call", method: m.name },
    });
  }

  return members;
}

function eventsOf(type: TypeDefinition): EventDescriptor[] {
  return (type.events ?? []).map((e) => ({
    name: e.name,
    payload: typeAt(`${type.name} event ${e.name}`, e.payload),
    description: e.description,
  }));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate `documents` and register them on `builder` in two phases.
 *
 * @throws {DefinitionError} On schema violations, notation errors, duplicate
 *   names or duplicate events.
 */
export function loadDefinitions(
  builder: RegistryBuilder,
  documents: readonly unknown[],
  logger: Logger = silentLogger,
): DefinitionFile[] {
  const files = documents.map((doc, i) => parseDefinitionFile(doc, `definition #${i + 1}`));

  for (const file of files) {
    for (const alias of file.aliases ?? []) {
      builder.declareAlias(alias.name, typeAt(alias.name, alias.type), alias.description ?? "");
    }
    for (const type of file.types) {
      builder.declareType(type.name, type.kind, type.description ?? "");
    }
  }

  for (const file of files) {
    for (const type of file.types) {
      builder.defineType(type.name, {
        inherits: type.inherits,
        implements: type.implements ?? [],
        nested: type.nested ?? [],
        members: membersOf(type),
      });
      const events = eventsOf(type);
      if (events.length > 0) builder.addEvents(type.name, events);
    }
    logger.debug("Loaded definitions", {
      library: file.library,
      section: file.section,
      types: file.types.length,
    });
  }

  return files;
}
