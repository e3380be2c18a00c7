export type {
  Project,
  ProjectDocument,
  ProjectStatus,
  PendingOperation,
  PendingOperationKind,
} from "./types.js";
export { initializeCatalogDatabase } from "./schema.js";
export {
  createCatalogStore,
  type CatalogStore,
  type CatalogStoreOptions,
} from "./store.js";
