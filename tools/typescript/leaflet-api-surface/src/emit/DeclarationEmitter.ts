/**
 * Declaration Emitter
 * ===================
 * Renders an {@link Assembly} as TypeScript declaration text describing the
 * bound surface: one `declare namespace` for the library, a nested namespace
 * for every dotted name (`TileLayer.Options` lives in `namespace TileLayer`),
 * options records as interfaces of optional fields, and event handlers with
 * the receiving object as their first parameter.
 *
 * @example
 * ```typescript
 * const dts = new DeclarationEmitter().emit(buildLeafletAssembly());
 * writeFileSync("leaflet-surface.d.ts", dts);
 * ```
 */

import type {
  AliasDescriptor,
  Assembly,
  DefaultValue,
  MemberDescriptor,
  ParameterDescriptor,
  TypeDescriptor,
  TypeEntry,
  TypeRef,
} from "../types.js";

export interface DeclarationEmitterOptions {
  /** Indentation unit (default: two spaces). */
  indent?: string;
  /** Emit doc comments from descriptions and defaults (default: true). */
  docComments?: boolean;
}

interface NamespaceNode {
  entries: TypeEntry[];
  children: Map<string, NamespaceNode>;
}

function emptyNode(): NamespaceNode {
  return { entries: [], children: new Map() };
}

function leafName(name: string): string {
  return name.slice(name.lastIndexOf(".") + 1);
}

function formatDefault(value: DefaultValue): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

// ---------------------------------------------------------------------------
// Type rendering
// ---------------------------------------------------------------------------

/** Render a {@link TypeRef} as a TypeScript type expression. */
export function renderType(ref: TypeRef): string {
  switch (ref.kind) {
    case "primitive":
      return ref.name === "integer" ? "number" : ref.name;
    case "host":
      return `globalThis.${ref.name.slice("dom.".length)}`;
    case "literal":
      return JSON.stringify(ref.value);
    case "named":
      return ref.name;
    case "array": {
      const inner = renderType(ref.element);
      return ref.element.kind === "union" || ref.element.kind === "function"
        ? `(${inner})[]`
        : `${inner}[]`;
    }
    case "tuple":
      return `[${ref.elements.map(renderType).join(", ")}]`;
    case "union":
      return ref.variants
        .map((v) => (v.kind === "function" ? `(${renderType(v)})` : renderType(v)))
        .join(" | ");
    case "function": {
      const params = ref.params.map(renderParameter);
      // The binding hands the receiver to the handler as its first argument.
      if (ref.self) params.unshift(`self: ${renderType(ref.self)}`);
      return `(${params.join(", ")}) => ${renderType(ref.returns)}`;
    }
  }
}

function renderParameter(param: ParameterDescriptor): string {
  return `${param.name}${param.optional ? "?" : ""}: ${renderType(param.type)}`;
}

// ---------------------------------------------------------------------------
// DeclarationEmitter class
// ---------------------------------------------------------------------------

export class DeclarationEmitter {
  private readonly config: Required<DeclarationEmitterOptions>;

  constructor(options: DeclarationEmitterOptions = {}) {
    this.config = {
      indent: options.indent ?? "  ",
      docComments: options.docComments ?? true,
    };
  }

  /** Render the whole assembly. */
  public emit(assembly: Assembly): string {
    const root = this.buildTree(assembly.types.entries);
    const lines = [
      `// Declarations for the ${assembly.library} namespace.`,
      `// Required resources: ${assembly.requires.join(", ") || "none"}.`,
      "",
      `declare namespace ${assembly.library} {`,
      ...this.emitNode(root, 1),
      "}",
      "",
    ];
    return lines.join("\n");
  }

  // ------------------------------------------------------------------
  // Private helpers
  // ------------------------------------------------------------------

  private buildTree(entries: readonly TypeEntry[]): NamespaceNode {
    const root = emptyNode();
    for (const entry of entries) {
      let node = root;
      for (const segment of entry.name.split(".").slice(0, -1)) {
        let child = node.children.get(segment);
        if (!child) {
          child = emptyNode();
          node.children.set(segment, child);
        }
        node = child;
      }
      node.entries.push(entry);
    }
    return root;
  }

  private emitNode(node: NamespaceNode, depth: number): string[] {
    const pad = this.config.indent.repeat(depth);
    const out: string[] = [];

    for (const entry of node.entries) {
      out.push(...this.doc(entry.description, depth));
      out.push(...(entry.kind === "alias" ? this.emitAlias(entry, pad) : this.emitType(entry, depth)));
    }
    for (const [name, child] of node.children) {
      out.push(`${pad}namespace ${name} {`, ...this.emitNode(child, depth + 1), `${pad}}`);
    }
    return out;
  }

  private emitAlias(alias: AliasDescriptor, pad: string): string[] {
    return [`${pad}type ${leafName(alias.name)} = ${renderType(alias.target)};`];
  }

  private emitType(type: TypeDescriptor, depth: number): string[] {
    const pad = this.config.indent.repeat(depth);
    const name = leafName(type.name);
    const out: string[] = [];

    if (type.kind === "class") {
      // Contracts merge in through an interface so the class body need not
      // repeat their members.
      if (type.implements.length > 0) {
        out.push(`${pad}interface ${name} extends ${type.implements.join(", ")} {}`);
      }
      const heritage = type.inherits ? ` extends ${type.inherits}` : "";
      out.push(`${pad}class ${name}${heritage} {`);
    } else {
      const bases = [...(type.inherits ? [type.inherits] : []), ...type.implements];
      const heritage = bases.length > 0 ? ` extends ${bases.join(", ")}` : "";
      out.push(`${pad}interface ${name}${heritage} {`);
    }

    for (const member of type.members) {
      out.push(...this.emitMember(type, member, depth + 1));
    }
    out.push(`${pad}}`);
    return out;
  }

  private emitMember(type: TypeDescriptor, member: MemberDescriptor, depth: number): string[] {
    const pad = this.config.indent.repeat(depth);
    const isClass = type.kind === "class";

    switch (member.kind) {
      case "constructor":
        // Options records are plain object literals.
        if (!isClass) return [];
        return [
          ...this.doc(member.description, depth),
          `${pad}constructor(${member.params.map(renderParameter).join(", ")});`,
        ];
      case "method": {
        const modifier = member.isStatic && isClass ? "static " : "";
        return [
          ...this.doc(member.description, depth),
          `${pad}${modifier}${member.name}(${member.params.map(renderParameter).join(", ")}): ${renderType(member.returns)};`,
        ];
      }
      case "property": {
        const modifiers = [
          member.isStatic && isClass ? "static " : "",
          member.access === "readonly" ? "readonly " : "",
        ].join("");
        const optional = type.kind === "options" ? "?" : "";
        const description =
          member.defaultValue !== undefined
            ? `${member.description} (default: ${formatDefault(member.defaultValue)})`.trim()
            : member.description;
        return [
          ...this.doc(description, depth),
          `${pad}${modifiers}${member.name}${optional}: ${renderType(member.type)};`,
        ];
      }
    }
  }

  private doc(text: string, depth: number): string[] {
    if (!this.config.docComments || text.length === 0) return [];
    const pad = this.config.indent.repeat(depth);
    return [`${pad}/** ${text.replace(/\*\//g, "*\\/")} */`];
  }
}
