export {
  createAnsweringService,
  type AnsweringService,
  type AnsweringServiceDeps,
  type ChatAnswer,
  type Citation,
} from "./service.js";
export {
  buildGroundingInstructions,
  type GroundingOptions,
} from "./instructions.js";
