export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
  DEFAULT_CATALOG_FILENAME,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export {
  applyEnvOverrides,
  loadSecrets,
  type Secrets,
} from "./env.js";
export {
  expandHomePath,
  resolveRootPath,
  resolveCatalogPath,
} from "./paths.js";
