export * from "./schema.js";
export {
  formatValidationErrors,
  validateDaemonFrame,
  validateEventFrame,
  validateEventsAppendResult,
  validateEventsSearchResult,
  validateHealthPayload,
  validateHelloOkPayload,
  validateNavigationResult,
  validateParamsForMethod,
  validateRequestFrame,
  validateResponseFrame,
  validateSearchBatchPayload,
} from "./validate.js";
