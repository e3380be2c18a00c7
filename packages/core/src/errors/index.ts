export {
  DocQaError,
  ValidationError,
  NotFoundError,
  ConflictError,
  GatewayError,
  ConfigurationError,
  UnsupportedAudioError,
  type ErrorStatus,
  type GatewayErrorKind,
} from "./catalog.js";
