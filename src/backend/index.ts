export {
  MissingCredentialError,
  BackendError,
  type ModelBackend,
} from "./types.js";
export {
  GeminiBackend,
  API_KEY_ENV,
  type GeminiBackendOptions,
} from "./gemini.js";
