/**
 * Surface Assembler
 * =================
 * Builds the complete Leaflet {@link Assembly}: the bundled definitions,
 * any extra definition documents, and the stylesheet/script resource pair.
 *
 * @example
 * ```typescript
 * import { SurfaceAssembler, createLogger } from "leaflet-api-surface";
 *
 * const assembly = new SurfaceAssembler({
 *   leafletVersion: "1.9.4",
 *   logger: createLogger("info"),
 * }).assemble();
 * ```
 */

import { LEAFLET_DEFINITIONS, loadDefinitions } from "./definitions/index.js";
import { ConfigError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { RegistryBuilder } from "./RegistryBuilder.js";
import type { AssemblerConfig, Assembly, TypeDescriptor } from "./types.js";
import { assertValidAssembly } from "./validate.js";

/** Names of the two resources every Leaflet assembly carries. */
export const STYLESHEET_RESOURCE = "Css";
export const SCRIPT_RESOURCE = "Js";

const DEFAULT_CDN = "https://unpkg.com/leaflet@{version}/dist";
const IDENTIFIER_RE = /^[A-Za-z_$][\w$]*$/;
const VERSION_RE = /^\d+\.\d+\.\d+(?:-[\w.]+)?$/;

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

/** Counts describing an assembly, used in log output. */
export interface AssemblySummary {
  types: number;
  aliases: number;
  optionsRecords: number;
  events: number;
  members: number;
  resources: number;
}

export function summariseAssembly(assembly: Assembly): AssemblySummary {
  const types = assembly.types.entries.filter(
    (e): e is TypeDescriptor => e.kind !== "alias",
  );
  return {
    types: types.length,
    aliases: assembly.types.entries.length - types.length,
    optionsRecords: types.filter((t) => t.kind === "options").length,
    events: types.reduce((n, t) => n + t.events.length, 0),
    members: types.reduce((n, t) => n + t.members.length, 0),
    resources: assembly.resources.entries.length,
  };
}

// ---------------------------------------------------------------------------
// SurfaceAssembler class
// ---------------------------------------------------------------------------

export class SurfaceAssembler {
  private readonly config: Required<AssemblerConfig>;

  /**
   * @param config - Partial configuration; see {@link AssemblerConfig} for
   *   the defaults.
   * @throws {ConfigError} `ERR_INVALID_CONFIG` if a value is unusable.
   */
  constructor(config: Partial<AssemblerConfig> = {}) {
    this.config = {
      library: config.library ?? "L",
      leafletVersion: config.leafletVersion ?? "1.9.4",
      cdnBaseUrl: config.cdnBaseUrl ?? DEFAULT_CDN,
      extraDefinitions: config.extraDefinitions ?? [],
      validate: config.validate ?? true,
      logger: config.logger ?? silentLogger,
    };
    this._validate();
  }

  /** CDN directory with `{version}` substituted and no trailing slash. */
  public get cdnDirectory(): string {
    return this.config.cdnBaseUrl
      .replaceAll("{version}", this.config.leafletVersion)
      .replace(/\/+$/, "");
  }

  /**
   * Build, validate and return the assembly.
   *
   * @throws {DefinitionError} If a definition document is malformed or
   *   breaks the registration contract.
   * @throws {AssemblyValidationError} If validation is enabled and fails.
   */
  public assemble(): Assembly {
    const { library, logger } = this.config;
    const builder = new RegistryBuilder({ library, logger });

    loadDefinitions(
      builder,
      [...LEAFLET_DEFINITIONS, ...this.config.extraDefinitions],
      logger,
    );

    const cdn = this.cdnDirectory;
    builder.addResource({
      name: STYLESHEET_RESOURCE,
      kind: "stylesheet",
      url: `${cdn}/leaflet.css`,
      dependsOn: [],
    });
    builder.addResource(
      {
        name: SCRIPT_RESOURCE,
        kind: "script",
        url: `${cdn}/leaflet.js`,
        dependsOn: [STYLESHEET_RESOURCE],
      },
      true,
    );

    const assembly = builder.build();
    if (this.config.validate) {
      assertValidAssembly(assembly);
    } else {
      logger.warn("Assembly validation skipped");
    }

    logger.info("Assembly built", {
      library,
      leafletVersion: this.config.leafletVersion,
      ...summariseAssembly(assembly),
    });
    return assembly;
  }

  // ------------------------------------------------------------------
  // Private helpers
  // ------------------------------------------------------------------

  private _validate(): void {
    const { library, leafletVersion, cdnBaseUrl } = this.config;

    if (!IDENTIFIER_RE.test(library)) {
      throw new ConfigError(
        `SurfaceAssembler: library "${library}" is not a valid global name.`,
        "ERR_INVALID_CONFIG",
        { field: "library", value: library },
      );
    }
    if (!VERSION_RE.test(leafletVersion)) {
      throw new ConfigError(
        `SurfaceAssembler: leafletVersion "${leafletVersion}" is not a semantic version.`,
        "ERR_INVALID_CONFIG",
        { field: "leafletVersion", value: leafletVersion },
      );
    }
    if (!/^(https?:)?\/\//.test(cdnBaseUrl) && !cdnBaseUrl.startsWith("/")) {
      throw new ConfigError(
        `SurfaceAssembler: cdnBaseUrl "${cdnBaseUrl}" must be an absolute or protocol-relative URL.`,
        "ERR_INVALID_CONFIG",
        { field: "cdnBaseUrl", value: cdnBaseUrl },
      );
    }
  }
}

/** Shorthand for `new SurfaceAssembler(config).assemble()`. */
export function buildLeafletAssembly(config: Partial<AssemblerConfig> = {}): Assembly {
  return new SurfaceAssembler(config).assemble();
}
