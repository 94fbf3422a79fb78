export {
  AGENT_TEMPLATE,
  AgentComposer,
  type AgentComposerOpts,
  type BuildAllResult,
  type BuildFailure,
} from "./composer.js";
export { createTemplateEnv, renderTemplate, type TemplateEnvOpts } from "./templates.js";
