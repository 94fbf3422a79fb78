import path from "node:path";
import { fileURLToPath } from "node:url";

// src/ and dist/ both sit one level below the package root.
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

export const BUNDLED_TEMPLATE_DIR = path.join(PACKAGE_ROOT, "templates");

export const SQL_DIR = path.join(PACKAGE_ROOT, "sql");

export const BUNDLED_STANDARDS_PATH = path.join(PACKAGE_ROOT, "standards", "security-controls.yaml");
