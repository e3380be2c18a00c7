import type { AnsweringService } from "@docqa/core/answering";
import type { ProjectsService } from "@docqa/core/projects";
import type { Logger } from "pino";

export interface McpContext {
  projects: ProjectsService;
  answering: AnsweringService;
  logger: Logger;
}
