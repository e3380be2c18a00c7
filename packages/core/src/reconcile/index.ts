export type { ReconcileReport, RepairResult } from "./types.js";
export {
  createReconcileEngine,
  type ReconcileEngine,
  type ReconcileEngineDeps,
} from "./engine.js";
