export { ByteBuffer, DEFAULT_BUFFER_CAPACITY } from "./core/byte-buffer"
export {
  type CheckResult,
  checkFrame,
  MAX_NESTING_DEPTH,
  parseFrame,
  serializeFrame,
} from "./core/codec"
export {
  type ArrayFrame,
  array,
  type BulkFrame,
  bulk,
  type ErrorFrame,
  error,
  type Frame,
  type FrameKind,
  type IntegerFrame,
  integer,
  MAX_U64,
  type NullFrame,
  nil,
  type SimpleFrame,
  simple,
} from "./core/frame"
export { FrameCursor } from "./core/frame-cursor"
export {
  IncompleteFrameError,
  ProtocolError,
  type ProtocolErrorOptions,
} from "./errors/protocol-errors"
