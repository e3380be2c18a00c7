export {
  createProjectsService,
  type ProjectsService,
  type ProjectsServiceDeps,
  type UploadOptions,
  type UploadOutcome,
} from "./service.js";
