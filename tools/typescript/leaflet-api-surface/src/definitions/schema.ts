/**
 * Definition File Format
 * ======================
 * Shape of the JSON documents that transcribe a library's API, and the JSON
 * schema they are checked against on load.
 *
 * Signatures use the type notation from `notation.ts`: parameters are
 * written `"name: Type"` or `"name?: Type"`, types as notation strings.
 */

import type { SchemaObject } from "ajv";

import type { DefaultValue, TypeKind } from "../types.js";

export interface AliasDefinition {
  name: string;
  type: string;
  description?: string;
}

export interface ConstructorDefinition {
  params?: string[];
  /** Options records only: parameters become these fields of an object literal. */
  fields?: string[];
  description?: string;
}

export interface MethodDefinition {
  name: string;
  params?: string[];
  /** Defaults to `void`. */
  returns?: string;
  static?: boolean;
  description?: string;
}

export interface PropertyDefinition {
  name: string;
  type: string;
  /** Defaults to `readwrite` for options records and `readonly` elsewhere. */
  access?: "readonly" | "readwrite";
  static?: boolean;
  default?: DefaultValue;
  description?: string;
}

export interface EventDefinition {
  name: string;
  payload: string;
  description: string;
}

export interface TypeDefinition {
  name: string;
  kind: TypeKind;
  description?: string;
  inherits?: string;
  implements?: string[];
  nested?: string[];
  constructors?: ConstructorDefinition[];
  properties?: PropertyDefinition[];
  methods?: MethodDefinition[];
  events?: EventDefinition[];
}

export interface DefinitionFile {
  /** Library the file describes, e.g. `"leaflet"`. */
  library: string;
  /** Short label used in log output and error context. */
  section: string;
  aliases?: AliasDefinition[];
  types: TypeDefinition[];
}

const stringArray = { type: "array", items: { type: "string" } };

const constructorSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    params: stringArray,
    fields: stringArray,
    description: { type: "string" },
  },
};

const methodSchema = {
  type: "object",
  additionalProperties: false,
  required: ["name"],
  properties: {
    name: { type: "string", minLength: 1 },
    params: stringArray,
    returns: { type: "string" },
    static: { type: "boolean" },
    description: { type: "string" },
  },
};

const propertySchema = {
  type: "object",
  additionalProperties: false,
  required: ["name", "type"],
  properties: {
    name: { type: "string", minLength: 1 },
    type: { type: "string" },
    access: { enum: ["readonly", "readwrite"] },
    static: { type: "boolean" },
    default: { type: ["string", "number", "boolean", "null"] },
    description: { type: "string" },
  },
};

const eventSchema = {
  type: "object",
  additionalProperties: false,
  required: ["name", "payload", "description"],
  properties: {
    name: { type: "string", minLength: 1 },
    payload: { type: "string" },
    description: { type: "string" },
  },
};

const typeSchema = {
  type: "object",
  additionalProperties: false,
  required: ["name", "kind"],
  properties: {
    name: { type: "string", minLength: 1 },
    kind: { enum: ["class", "interface", "options"] },
    description: { type: "string" },
    inherits: { type: "string" },
    implements: stringArray,
    nested: stringArray,
    constructors: { type: "array", items: constructorSchema },
    properties: { type: "array", items: propertySchema },
    methods: { type: "array", items: methodSchema },
    events: { type: "array", items: eventSchema },
  },
};

const aliasSchema = {
  type: "object",
  additionalProperties: false,
  required: ["name", "type"],
  properties: {
    name: { type: "string", minLength: 1 },
    type: { type: "string" },
    description: { type: "string" },
  },
};

export const definitionFileSchema: SchemaObject = {
  type: "object",
  additionalProperties: false,
  required: ["library", "section", "types"],
  properties: {
    $schema: { type: "string" },
    library: { type: "string", minLength: 1 },
    section: { type: "string", minLength: 1 },
    aliases: { type: "array", items: aliasSchema },
    types: { type: "array", items: typeSchema },
  },
};
