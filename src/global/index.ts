export {
  BASE_PRIORITY,
  ENVIRONMENT_PRIORITY,
  GLOBAL_TEMPLATE,
  GlobalConfigBuilder,
  PROFILE_PRIORITY,
  SECTION_SEPARATOR,
  environmentSection,
  mergeSections,
  profileSection,
  sectionName,
  type ConfigSection,
  type GlobalBuild,
  type GlobalConfigBuilderOpts,
} from "./builder.js";
export { environmentFileSchema, profileFileSchema, type EnvironmentFile, type ProfileFile } from "./schemas.js";
