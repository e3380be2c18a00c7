import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import type { ServerConfig } from "../schemas/server-config.js";
import { DEFAULT_CATALOG_FILENAME, DEFAULT_ROOT_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured root path (or default) to an absolute path.
 */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

/**
 * Catalog database location: the configured path (relative paths are taken
 * from the root), or `catalog.db` inside the root. ":memory:" passes through.
 */
export function resolveCatalogPath(
  config: Pick<ServerConfig, "catalog">,
  rootPath: string,
): string {
  const configured = config.catalog.path;
  if (configured === null) {
    return join(rootPath, DEFAULT_CATALOG_FILENAME);
  }
  if (configured === ":memory:") {
    return configured;
  }
  const expanded = expandHomePath(configured);
  return isAbsolute(expanded) ? expanded : resolve(rootPath, expanded);
}
