/**
 * Bundled Leaflet 1.9 definitions, in load order.
 */

import controls from "./leaflet/controls.json" with { type: "json" };
import core from "./leaflet/core.json" with { type: "json" };
import events from "./leaflet/events.json" with { type: "json" };
import layers from "./leaflet/layers.json" with { type: "json" };
import map from "./leaflet/map.json" with { type: "json" };
import ui from "./leaflet/ui.json" with { type: "json" };
import vectors from "./leaflet/vectors.json" with { type: "json" };

export const LEAFLET_DEFINITIONS: readonly unknown[] = [
  core,
  events,
  layers,
  ui,
  vectors,
  controls,
  map,
];

export { loadDefinitions, parseDefinitionFile } from "./loader.js";
export { definitionFileSchema } from "./schema.js";
export type {
  AliasDefinition,
  ConstructorDefinition,
  DefinitionFile,
  EventDefinition,
  MethodDefinition,
  PropertyDefinition,
  TypeDefinition,
} from "./schema.js";
