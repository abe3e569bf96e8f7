/**
 * Resource Injection
 * ==================
 * Adds an assembly's stylesheets and scripts to a document in dependency
 * order. Each element gets a stable id so repeated calls are no-ops.
 */

import { ConfigError } from "./errors.js";
import type { Assembly, ResourceDescriptor } from "./types.js";

/** Element id used for a resource, e.g. `"L-Resources-Css"`. */
export function resourceElementId(assembly: Assembly, resource: ResourceDescriptor): string {
  return `${assembly.resources.name}.${resource.name}`.replace(/\./g, "-");
}

/**
 * Order resources so that every resource follows its dependencies.
 * Ties keep registration order.
 *
 * @throws {ConfigError} `ERR_RESOURCE_ORDER` on an unknown dependency or a cycle.
 */
export function orderResources(resources: readonly ResourceDescriptor[]): ResourceDescriptor[] {
  const byName = new Map(resources.map((r) => [r.name, r]));
  const ordered: ResourceDescriptor[] = [];
  const state = new Map<string, "visiting" | "done">();

  const visit = (resource: ResourceDescriptor, path: string[]): void => {
    const mark = state.get(resource.name);
    if (mark === "done") return;
    if (mark === "visiting") {
      throw new ConfigError(
        `Resources: dependency cycle ${[...path, resource.name].join(" -> ")}.`,
        "ERR_RESOURCE_ORDER",
        { cycle: [...path, resource.name] },
      );
    }

    state.set(resource.name, "visiting");
    for (const dep of resource.dependsOn) {
      const target = byName.get(dep);
      if (!target) {
        throw new ConfigError(
          `Resources: "${resource.name}" depends on unknown resource "${dep}".`,
          "ERR_RESOURCE_ORDER",
          { resource: resource.name, dependency: dep },
        );
      }
      visit(target, [...path, resource.name]);
    }
    state.set(resource.name, "done");
    ordered.push(resource);
  };

  for (const resource of resources) visit(resource, []);
  return ordered;
}

function createElement(doc: Document, resource: ResourceDescriptor, id: string): HTMLElement {
  if (resource.kind === "stylesheet") {
    const link = doc.createElement("link");
    link.id = id;
    link.rel = "stylesheet";
    link.href = resource.url;
    return link;
  }
  const script = doc.createElement("script");
  script.id = id;
  script.src = resource.url;
  // Keep execution in insertion order.
  script.async = false;
  return script;
}

/**
 * Append the assembly's resources to `doc.head`.
 *
 * @returns The elements added by this call (empty when all were present).
 * @throws {ConfigError} `ERR_RESOURCE_ORDER` if the resources cannot be ordered.
 */
export function injectResources(assembly: Assembly, doc: Document = document): HTMLElement[] {
  const added: HTMLElement[] = [];
  for (const resource of orderResources(assembly.resources.entries)) {
    const id = resourceElementId(assembly, resource);
    if (doc.getElementById(id)) continue;
    const el = createElement(doc, resource, id);
    doc.head.appendChild(el);
    added.push(el);
  }
  return added;
}
