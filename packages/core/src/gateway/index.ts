export type {
  CallOptions,
  GroundedAnswer,
  IndexGateway,
  RemoteDocumentListing,
} from "./types.js";
export {
  createOpenAiIndexGateway,
  classifyOpenAiError,
  type OpenAiIndexGatewayOptions,
} from "./openai.js";
export { withTimeout } from "./timeout.js";
