/**
 * Leaflet API Surface: Public API
 * ================================
 * Re-exports all public symbols for library consumers.
 */

export {
  SCRIPT_RESOURCE,
  STYLESHEET_RESOURCE,
  SurfaceAssembler,
  buildLeafletAssembly,
  summariseAssembly,
} from "./SurfaceAssembler.js";
export type { AssemblySummary } from "./SurfaceAssembler.js";
export { RegistryBuilder } from "./RegistryBuilder.js";
export type { RegistryBuilderOptions, TypeDefinitionInput } from "./RegistryBuilder.js";
export {
  ACCESSOR_PREFIXES,
  EVENT_BASE_TYPE,
  accessorName,
  augmentWithEvents,
  eventAccessors,
  genericEventMembers,
} from "./events.js";
export type { AccessorPrefix } from "./events.js";
export { assertValidAssembly, validateAssembly } from "./validate.js";
export {
  formatParameter,
  formatTypeRef,
  parseParameter,
  parseType,
  referencedNames,
} from "./notation.js";
export {
  LEAFLET_DEFINITIONS,
  definitionFileSchema,
  loadDefinitions,
  parseDefinitionFile,
} from "./definitions/index.js";
export type {
  AliasDefinition,
  ConstructorDefinition,
  DefinitionFile,
  EventDefinition,
  MethodDefinition,
  PropertyDefinition,
  TypeDefinition,
} from "./definitions/index.js";
export { Binding } from "./runtime/Binding.js";
export type { BindingOptions, BoundObject } from "./runtime/Binding.js";
export { DeclarationEmitter, renderType } from "./emit/DeclarationEmitter.js";
export type { DeclarationEmitterOptions } from "./emit/DeclarationEmitter.js";
export { injectResources, orderResources, resourceElementId } from "./resources.js";
export { CoordinatesDemo } from "./demo/CoordinatesDemo.js";
export type { CoordinatesDemoConfig } from "./demo/CoordinatesDemo.js";
export { ConsoleLogger, createLogger, silentLogger } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";
export {
  AssemblyValidationError,
  BindingError,
  ConfigError,
  DefinitionError,
  NotationError,
  SurfaceError,
} from "./errors.js";
export type {
  ErrorCode,
  ErrorContext,
  SurfaceErrorJSON,
  ValidationIssue,
  ValidationIssueCode,
} from "./errors.js";
export type {
  AliasDescriptor,
  AssemblerConfig,
  Assembly,
  ConstructorDescriptor,
  DefaultValue,
  EventDescriptor,
  Forward,
  MemberDescriptor,
  MethodDescriptor,
  Namespace,
  ParameterDescriptor,
  PrimitiveName,
  PropertyDescriptor,
  ResourceDescriptor,
  TypeDescriptor,
  TypeEntry,
  TypeKind,
  TypeRef,
} from "./types.js";
