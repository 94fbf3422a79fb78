export {
  CLAUDE_MD_TEMPLATE,
  ClaudeMdGenerator,
  CoordinationGraph,
  generateAgentDirectory,
  generateMermaidGraph,
  type ClaudeMdGeneratorOpts,
  type GenerateOpts,
} from "./claudeMd.js";
export * from "./rules.js";
