export {
  TransformationService,
  type TransformationServiceOptions,
  type TransformResult,
} from "./transformer.js";
export { preparePrompt, type PreparedPrompt } from "./prepare.js";
export {
  EmptyContentError,
  InputError,
  describeError,
  type FailureDescriptor,
  type FailureKind,
} from "./errors.js";
export {
  createTransformationService,
  createConfiguredLogger,
  type ServiceFactoryOptions,
} from "./factory.js";
