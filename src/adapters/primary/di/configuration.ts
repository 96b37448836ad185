import * as path from "path";
import { SelectionEngineOptions } from "../../../application/ports/driving/SelectionEngineOptions";

export const DEFAULT_PROJECTS_FILE = "projects.json";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return TRUTHY.has(value.trim().toLowerCase());
}

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Construye las opciones a partir de variables de entorno:
 * TREE_CONTEXT_ROOT, TREE_CONTEXT_PROJECTS_FILE, TREE_CONTEXT_IGNORE (lista separada por comas),
 * TREE_CONTEXT_DEFAULT_PATTERNS, TREE_CONTEXT_GITIGNORE y TREE_CONTEXT_VERBOSE.
 */
export function loadConfiguration(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): SelectionEngineOptions {
  const rootPath = path.resolve(cwd, env.TREE_CONTEXT_ROOT || ".");
  return {
    rootPath,
    projectsFilePath: path.resolve(
      cwd,
      env.TREE_CONTEXT_PROJECTS_FILE || DEFAULT_PROJECTS_FILE
    ),
    customIgnorePatterns: parseList(env.TREE_CONTEXT_IGNORE),
    includeDefaultPatterns: parseFlag(env.TREE_CONTEXT_DEFAULT_PATTERNS, false),
    includeGitIgnore: parseFlag(env.TREE_CONTEXT_GITIGNORE, false),
    verboseLogging: parseFlag(env.TREE_CONTEXT_VERBOSE, false),
  };
}
