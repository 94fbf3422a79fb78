export {
  ConfigValidator,
  formatValidationReport,
  type CatalogValidationReport,
  type ConfigValidatorOpts,
  type ValidatedItem,
  type ValidationResult,
  type ValidationSection,
} from "./configValidator.js";
