export * from "./agents/nutrition-advisor"
export {
  createRetrievalLogger,
  createNoopLogger,
  RetrievalLogger,
  type LogAction,
  type LogLevel
} from "./tools/nutrition/logger"
export {
  ErrorType,
  TimeoutError,
  classifyError,
  type RetrievalStage,
  type StageError
} from "./tools/nutrition/error-handler"
export {
  checkLangSmithConfig,
  isLangSmithEnabled
} from "./monitoring/langsmith-setup"
