export { AppContext, AppContextBuilder, DEFAULT_SERVICE_NAME } from "./core/app-context"
export { ContextError, type ContextErrorCode } from "./core/errors/context-error"
