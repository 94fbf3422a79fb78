import fs from "node:fs/promises";
import path from "node:path";
import { pathExists } from "../catalog/loader.js";
import { InstallError, errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";

export interface InstallOpts {
  /** Build output to install from */
  outputDir: string;
  /** Usually ~/.claude */
  targetDir: string;
  /** Remove existing agents/*.md from the target first (default true) */
  clean?: boolean;
  dryRun?: boolean;
  logger?: Logger;
}

export interface InstallResult {
  targetDir: string;
  /** Paths relative to the target, e.g. "agents/old-agent.md" */
  cleaned: string[];
  /** Paths relative to the output directory */
  copied: string[];
  dryRun: boolean;
}

async function listFiles(root: string, prefix = ""): Promise<string[]> {
  const files: string[] = [];
  const entries = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
  for (const entry of entries) {
    const rel = prefix ? path.join(prefix, entry.name) : entry.name;
    if (entry.isDirectory()) files.push(...(await listFiles(root, rel)));
    else if (entry.isFile()) files.push(rel);
  }
  return files.sort();
}

/** Run filesystem work, reporting any failure as an InstallError for `targetDir`. */
async function intoTarget<T>(targetDir: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof InstallError) throw err;
    throw new InstallError(`Cannot install to ${targetDir}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Install the build output into the target directory. In dry-run mode the
 * result lists what would be removed and copied; nothing on disk changes.
 */
export async function install(opts: InstallOpts): Promise<InstallResult> {
  const logger = (opts.logger ?? getLogger()).child({ component: "installer" });
  const clean = opts.clean ?? true;
  const dryRun = opts.dryRun ?? false;

  if (!(await pathExists(opts.outputDir))) {
    throw new InstallError(`Output directory ${opts.outputDir} does not exist. Run 'build' first.`);
  }

  return intoTarget(opts.targetDir, async () => {
    if (!dryRun) await fs.mkdir(opts.targetDir, { recursive: true });

    const cleaned: string[] = [];
    const agentsDir = path.join(opts.targetDir, "agents");
    if (clean && (await pathExists(agentsDir))) {
      const existing = (await fs.readdir(agentsDir)).filter((f) => f.endsWith(".md")).sort();
      for (const file of existing) {
        if (!dryRun) await fs.rm(path.join(agentsDir, file));
        cleaned.push(`agents/${file}`);
      }
      logger.info({ count: cleaned.length, dryRun }, "Cleaned existing agents");
    }

    const copied: string[] = [];
    for (const rel of await listFiles(opts.outputDir)) {
      if (!dryRun) {
        const dest = path.join(opts.targetDir, rel);
        await fs.mkdir(path.dirname(dest), { recursive: true });
        await fs.copyFile(path.join(opts.outputDir, rel), dest);
      }
      copied.push(rel.split(path.sep).join("/"));
    }

    logger.info({ copied: copied.length, targetDir: opts.targetDir, dryRun }, "Install complete");
    return { targetDir: opts.targetDir, cleaned, copied, dryRun };
  });
}

export interface InstallGlobalOpts {
  /** The built global CLAUDE.md */
  sourcePath: string;
  targetDir: string;
  dryRun?: boolean;
  logger?: Logger;
}

export interface InstallGlobalResult {
  installedPath: string;
  /** Set when an existing CLAUDE.md was (or would be) copied aside */
  backupPath?: string;
  dryRun: boolean;
}

/** Copy a built global CLAUDE.md into the target, keeping the previous one as CLAUDE.md.backup. */
export async function installGlobal(opts: InstallGlobalOpts): Promise<InstallGlobalResult> {
  const logger = (opts.logger ?? getLogger()).child({ component: "installer" });
  const dryRun = opts.dryRun ?? false;

  if (!(await pathExists(opts.sourcePath))) {
    throw new InstallError(`Global configuration ${opts.sourcePath} does not exist. Run 'build-global' first.`);
  }

  const installedPath = path.join(opts.targetDir, "CLAUDE.md");

  return intoTarget(opts.targetDir, async () => {
    let backupPath: string | undefined;
    if (await pathExists(installedPath)) {
      backupPath = `${installedPath}.backup`;
      if (!dryRun) await fs.copyFile(installedPath, backupPath);
      logger.info({ backupPath, dryRun }, "Backed up existing global configuration");
    }

    if (!dryRun) {
      await fs.mkdir(opts.targetDir, { recursive: true });
      await fs.copyFile(opts.sourcePath, installedPath);
    }

    logger.info({ installedPath, dryRun }, "Installed global configuration");
    return { installedPath, backupPath, dryRun };
  });
}
