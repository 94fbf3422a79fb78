/**
 * Error hierarchy for persona-forge.
 *
 * Library code throws these; the CLI catches them at the command boundary
 * and turns them into a message plus a non-zero exit code.
 */

export type ErrorCode =
  | "PERSONA_NOT_FOUND"
  | "TRAIT_NOT_FOUND"
  | "CONTENT_NOT_FOUND"
  | "PARSE_ERROR"
  | "VALIDATION_FAILED"
  | "TEMPLATE_ERROR"
  | "CIRCULAR_DEPENDENCY"
  | "KNOWLEDGE_SOURCE_ERROR"
  | "INSTALL_FAILED";

export class PersonaForgeError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PersonaForgeError";
  }
}

function withSearchPath(message: string, searchPath?: string): string {
  return searchPath ? `${message} in ${searchPath}` : message;
}

export class PersonaNotFoundError extends PersonaForgeError {
  constructor(
    public readonly personaName: string,
    public readonly searchPath?: string
  ) {
    super(withSearchPath(`Persona '${personaName}' not found`, searchPath), "PERSONA_NOT_FOUND");
    this.name = "PersonaNotFoundError";
  }
}

export class TraitNotFoundError extends PersonaForgeError {
  constructor(
    public readonly traitRef: string,
    public readonly searchPath?: string
  ) {
    super(withSearchPath(`Trait '${traitRef}' not found`, searchPath), "TRAIT_NOT_FOUND");
    this.name = "TraitNotFoundError";
  }
}

export class ContentNotFoundError extends PersonaForgeError {
  constructor(
    public readonly contentPath: string,
    public readonly basePath?: string
  ) {
    super(withSearchPath(`Content file '${contentPath}' not found`, basePath), "CONTENT_NOT_FOUND");
    this.name = "ContentNotFoundError";
  }
}

/** A file exists but is not valid YAML or does not have the expected shape. */
export class CatalogParseError extends PersonaForgeError {
  constructor(
    public readonly filePath: string,
    public readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(`Invalid ${filePath}: ${issues.join("; ")}`, "PARSE_ERROR", options);
    this.name = "CatalogParseError";
  }
}

export class ValidationError extends PersonaForgeError {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(message, "VALIDATION_FAILED");
    this.name = "ValidationError";
  }
}

export class TemplateError extends PersonaForgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TEMPLATE_ERROR", options);
    this.name = "TemplateError";
  }
}

export class CircularDependencyError extends PersonaForgeError {
  constructor(public readonly dependencyChain: string[]) {
    super(`Circular dependency detected: ${dependencyChain.join(" -> ")}`, "CIRCULAR_DEPENDENCY");
    this.name = "CircularDependencyError";
  }
}

export class KnowledgeSourceError extends PersonaForgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "KNOWLEDGE_SOURCE_ERROR", options);
    this.name = "KnowledgeSourceError";
  }
}

export class InstallError extends PersonaForgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INSTALL_FAILED", options);
    this.name = "InstallError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
