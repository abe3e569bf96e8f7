/**
 * Type Notation
 * =============
 * Compact textual notation for {@link TypeRef}s, used throughout the
 * definition files so that signatures read like TypeScript.
 *
 * @example
 * ```ts
 * parseType("LatLng | [number, number]");
 * parseType("(this: Map, event: MouseEvent) => void");
 * parseParameter("options?: ZoomPanOptions");
 * ```
 *
 * Primitive names map to `primitive` refs, `dom.*` names to `host` refs,
 * quoted strings to `literal` refs and any other (dotted) identifier to a
 * `named` registry reference.
 */

import { NotationError } from "./errors.js";
import type { ParameterDescriptor, PrimitiveName, TypeRef } from "./types.js";

const PRIMITIVES: ReadonlySet<string> = new Set<PrimitiveName>([
  "string",
  "number",
  "integer",
  "boolean",
  "void",
  "object",
  "unknown",
  "null",
]);

const HOST_PREFIX = "dom.";

function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVES.has(name);
}

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

type TokenKind = "ident" | "string" | "punct" | "end";

interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

const IDENT_RE = /[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*/y;
const PUNCT = ["=>", "|", "[", "]", "(", ")", ",", ":", "?"];

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const close = source.indexOf(ch, i + 1);
      if (close < 0) {
        throw new NotationError("unterminated string literal", source, i);
      }
      tokens.push({ kind: "string", text: source.slice(i + 1, close), position: i });
      i = close + 1;
      continue;
    }

    IDENT_RE.lastIndex = i;
    const ident = IDENT_RE.exec(source);
    if (ident) {
      tokens.push({ kind: "ident", text: ident[0], position: i });
      i += ident[0].length;
      continue;
    }

    const punct = PUNCT.find((p) => source.startsWith(p, i));
    if (!punct) {
      throw new NotationError(`unexpected character '${ch}'`, source, i);
    }
    tokens.push({ kind: "punct", text: punct, position: i });
    i += punct.length;
  }

  tokens.push({ kind: "end", text: "", position: source.length });
  return tokens;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

class NotationParser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(private readonly source: string) {
    this.tokens = tokenize(source);
  }

  public parseTypeToEnd(): TypeRef {
    const type = this.parseUnion();
    this.expectEnd();
    return type;
  }

  public parseParameterToEnd(): ParameterDescriptor {
    const { param } = this.parseParameter(0);
    this.expectEnd();
    return param;
  }

  private peek(offset = 0): Token {
    const token = this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
    if (!token) {
      throw new NotationError("empty notation", this.source, 0);
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== "end") this.index++;
    return token;
  }

  private isPunct(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === "punct" && token.text === text;
  }

  private expectPunct(text: string): void {
    const token = this.next();
    if (token.kind !== "punct" || token.text !== text) {
      this.fail(`expected '${text}'`, token);
    }
  }

  private expectEnd(): void {
    const token = this.peek();
    if (token.kind !== "end") {
      this.fail(`unexpected '${token.text}'`, token);
    }
  }

  private fail(message: string, token: Token): never {
    throw new NotationError(message, this.source, token.position);
  }

  private parseUnion(): TypeRef {
    const variants: TypeRef[] = [];
    const push = (t: TypeRef): void => {
      if (t.kind === "union") variants.push(...t.variants);
      else variants.push(t);
    };

    push(this.parsePostfix());
    while (this.isPunct("|")) {
      this.next();
      push(this.parsePostfix());
    }

    const [only] = variants;
    return variants.length === 1 && only ? only : { kind: "union", variants };
  }

  private parsePostfix(): TypeRef {
    let type = this.parsePrimary();
    while (this.isPunct("[") && this.isPunct("]", 1)) {
      this.next();
      this.next();
      type = { kind: "array", element: type };
    }
    return type;
  }

  private parsePrimary(): TypeRef {
    const token = this.next();

    if (token.kind === "ident") {
      if (isPrimitiveName(token.text)) return { kind: "primitive", name: token.text };
      if (token.text.startsWith(HOST_PREFIX)) return { kind: "host", name: token.text };
      return { kind: "named", name: token.text };
    }

    if (token.kind === "string") {
      return { kind: "literal", value: token.text };
    }

    if (token.kind === "punct" && token.text === "[") {
      const elements: TypeRef[] = [this.parseUnion()];
      while (this.isPunct(",")) {
        this.next();
        elements.push(this.parseUnion());
      }
      this.expectPunct("]");
      return { kind: "tuple", elements };
    }

    if (token.kind === "punct" && token.text === "(") {
      return this.parseParenthesised(token);
    }

    return this.fail(token.kind === "end" ? "unexpected end" : `unexpected '${token.text}'`, token);
  }

  /** `(T)` groups; `(a: A, b?: B) => R` is a function type. */
  private parseParenthesised(open: Token): TypeRef {
    const params: ParameterDescriptor[] = [];
    let self: TypeRef | undefined;
    let named = false;

    if (!this.isPunct(")")) {
      do {
        if (this.isPunct(",")) this.next();
        const parsed = this.parseParameter(params.length);
        if (parsed.param.name === "this") {
          self = parsed.param.type;
        } else {
          params.push(parsed.param);
        }
        named ||= parsed.named;
      } while (this.isPunct(","));
    }
    this.expectPunct(")");

    if (this.isPunct("=>")) {
      this.next();
      const returns = this.parseUnion();
      return self
        ? { kind: "function", self, params, returns }
        : { kind: "function", params, returns };
    }

    const [single] = params;
    if (params.length !== 1 || named || self || !single) {
      return this.fail("expected '=>' after parameter list", open);
    }
    return single.type;
  }

  /** `name: T`, `name?: T`, or a bare type named `arg<index>`. */
  private parseParameter(index: number): { param: ParameterDescriptor; named: boolean } {
    const head = this.peek();
    const namedRequired = this.isPunct(":", 1);
    const namedOptional = this.isPunct("?", 1) && this.isPunct(":", 2);

    if (head.kind === "ident" && (namedRequired || namedOptional)) {
      this.next();
      if (namedOptional) this.next();
      this.next();
      const param = { name: head.text, type: this.parseUnion(), optional: namedOptional };
      return { param, named: true };
    }

    const param = { name: `arg${index}`, type: this.parseUnion(), optional: false };
    return { param, named: false };
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse a type notation string.
 *
 * @throws {NotationError} On any syntax error.
 */
export function parseType(source: string): TypeRef {
  return new NotationParser(source).parseTypeToEnd();
}

/**
 * Parse a parameter declaration such as `"zoom?: integer"`.
 *
 * @throws {NotationError} On any syntax error.
 */
export function parseParameter(source: string): ParameterDescriptor {
  return new NotationParser(source).parseParameterToEnd();
}

function needsParens(ref: TypeRef): boolean {
  return ref.kind === "union" || ref.kind === "function";
}

/** Render a parameter as `name?: Type`. */
export function formatParameter(param: ParameterDescriptor): string {
  return `${param.name}${param.optional ? "?" : ""}: ${formatTypeRef(param.type)}`;
}

/** Render a {@link TypeRef} back into notation. */
export function formatTypeRef(ref: TypeRef): string {
  switch (ref.kind) {
    case "primitive":
    case "host":
    case "named":
      return ref.name;
    case "literal":
      return `'${ref.value}'`;
    case "array": {
      const inner = formatTypeRef(ref.element);
      return needsParens(ref.element) ? `(${inner})[]` : `${inner}[]`;
    }
    case "tuple":
      return `[${ref.elements.map(formatTypeRef).join(", ")}]`;
    case "union":
      return ref.variants
        .map((v) => (v.kind === "function" ? `(${formatTypeRef(v)})` : formatTypeRef(v)))
        .join(" | ");
    case "function": {
      const params = ref.params.map(formatParameter);
      if (ref.self) params.unshift(`this: ${formatTypeRef(ref.self)}`);
      return `(${params.join(", ")}) => ${formatTypeRef(ref.returns)}`;
    }
  }
}

/** Every registry name a reference mentions, in order of appearance. */
export function referencedNames(ref: TypeRef): string[] {
  switch (ref.kind) {
    case "named":
      return [ref.name];
    case "array":
      return referencedNames(ref.element);
    case "tuple":
      return ref.elements.flatMap(referencedNames);
    case "union":
      return ref.variants.flatMap(referencedNames);
    case "function":
      return [
        ...(ref.self ? referencedNames(ref.self) : []),
        ...ref.params.flatMap((p) => referencedNames(p.type)),
        ...referencedNames(ref.returns),
      ];
    default:
      return [];
  }
}
