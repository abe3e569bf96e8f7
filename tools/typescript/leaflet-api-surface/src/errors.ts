/**
 * Errors
 * ======
 * Every failure raised while describing, assembling or binding the API
 * surface is a {@link SurfaceError} carrying a stable `code`.
 *
 * - NotationError: a type notation string could not be parsed
 * - DefinitionError: a registration broke the two-phase builder contract
 * - ConfigError: assembler or resource configuration is unusable
 * - AssemblyValidationError: structural checks failed before hand-off
 * - BindingError: a runtime call could not be forwarded to the library
 */

export type ErrorCode =
  | "ERR_NOTATION_SYNTAX"
  | "ERR_DUPLICATE_TYPE"
  | "ERR_UNDECLARED_TYPE"
  | "ERR_DUPLICATE_DEFINITION"
  | "ERR_UNDEFINED_TYPE"
  | "ERR_DUPLICATE_EVENT"
  | "ERR_DUPLICATE_RESOURCE"
  | "ERR_INVALID_DEFINITION_FILE"
  | "ERR_INVALID_CONFIG"
  | "ERR_RESOURCE_ORDER"
  | "ERR_VALIDATION_FAILED"
  | "ERR_NO_OVERLOAD"
  | "ERR_UNKNOWN_MEMBER"
  | "ERR_UNKNOWN_TYPE"
  | "ERR_LIBRARY_PATH";

export interface ErrorContext {
  typeName?: string;
  member?: string;
  [key: string]: unknown;
}

export interface SurfaceErrorJSON {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
}

export abstract class SurfaceError extends Error {
  abstract readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SurfaceErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Raised by the notation parser; `context.position` is the offending offset. */
export class NotationError extends SurfaceError {
  readonly code = "ERR_NOTATION_SYNTAX" as const;

  constructor(message: string, source: string, position: number) {
    super(`Notation: ${message} at ${position} in "${source}"`, {
      source,
      position,
    });
  }
}

export type DefinitionErrorCode = Extract<
  ErrorCode,
  | "ERR_DUPLICATE_TYPE"
  | "ERR_UNDECLARED_TYPE"
  | "ERR_DUPLICATE_DEFINITION"
  | "ERR_UNDEFINED_TYPE"
  | "ERR_DUPLICATE_EVENT"
  | "ERR_DUPLICATE_RESOURCE"
  | "ERR_INVALID_DEFINITION_FILE"
>;

export class DefinitionError extends SurfaceError {
  readonly code: DefinitionErrorCode;

  constructor(message: string, code: DefinitionErrorCode, context: ErrorContext = {}) {
    super(message, context);
    this.code = code;
  }
}

export type ConfigErrorCode = Extract<ErrorCode, "ERR_INVALID_CONFIG" | "ERR_RESOURCE_ORDER">;

export class ConfigError extends SurfaceError {
  readonly code: ConfigErrorCode;

  constructor(message: string, code: ConfigErrorCode, context: ErrorContext = {}) {
    super(message, context);
    this.code = code;
  }
}

export type ValidationIssueCode =
  | "ERR_DUPLICATE_EVENT"
  | "ERR_EVENT_ACCESSORS"
  | "ERR_EVENT_PAYLOAD"
  | "ERR_UNRESOLVED_REFERENCE"
  | "ERR_INHERITANCE_CYCLE"
  | "ERR_OPTIONS_CONSTRUCTOR"
  | "ERR_RESOURCE_DEPENDENCY";

/** A single problem found by {@link validateAssembly}. */
export interface ValidationIssue {
  code: ValidationIssueCode;
  /** Type or resource the issue was found on. */
  subject: string;
  message: string;
}

export class AssemblyValidationError extends SurfaceError {
  readonly code = "ERR_VALIDATION_FAILED" as const;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    const lines = issues.map((i) => `  [${i.code}] ${i.subject}: ${i.message}`);
    super(
      `Assembly failed validation with ${issues.length} issue(s):\n${lines.join("\n")}`,
      { issueCount: issues.length },
    );
    this.issues = issues;
  }
}

export type BindingErrorCode = Extract<
  ErrorCode,
  "ERR_NO_OVERLOAD" | "ERR_UNKNOWN_MEMBER" | "ERR_UNKNOWN_TYPE" | "ERR_LIBRARY_PATH"
>;

export class BindingError extends SurfaceError {
  readonly code: BindingErrorCode;

  constructor(message: string, code: BindingErrorCode, context: ErrorContext = {}) {
    super(message, context);
    this.code = code;
  }
}
