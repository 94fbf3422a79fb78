import nunjucks from "nunjucks";
import type { Environment } from "nunjucks";
import { TemplateError, errorMessage } from "../errors.js";

export interface TemplateEnvOpts {
  /** Searched first: agent.md.njk, CLAUDE.md.njk and their partials */
  templateDir: string;
  /** Searched second, so templates can include trait and content files */
  dataDir?: string;
}

/**
 * Jinja2-compatible template environment. Output is markdown, so nothing is
 * autoescaped.
 */
export function createTemplateEnv(opts: TemplateEnvOpts): Environment {
  const searchPaths = opts.dataDir ? [opts.templateDir, opts.dataDir] : [opts.templateDir];
  const loader = new nunjucks.FileSystemLoader(searchPaths, { noCache: true });

  return new nunjucks.Environment(loader, {
    autoescape: false,
    trimBlocks: true,
    lstripBlocks: true,
    throwOnUndefined: false,
  });
}

export function renderTemplate(
  env: Environment,
  name: string,
  context: object
): string {
  try {
    return env.render(name, context);
  } catch (err) {
    throw new TemplateError(`Failed to render ${name}: ${errorMessage(err)}`, { cause: err });
  }
}
