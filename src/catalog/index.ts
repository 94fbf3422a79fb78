export type {
  AgentComposition,
  AgentConfig,
  ModelTier,
  ProactiveTriggers,
  TraitConfig,
} from "./types.js";
export { MODEL_TIERS, isModelTier } from "./types.js";
export { Catalog, applyComposition, effectiveCoordination, pathExists, resolveTraitRefs, type CatalogOpts } from "./loader.js";
