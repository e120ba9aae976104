export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
export {
  BaseError,
  serializeError,
  type BaseErrorOptions,
  type SerializeOptions,
} from "./core/base-error"
export { toAppError } from "./core/utils/to-app-error"
