// MessagePack-RPC core
//
// This package contains the endpoint, the handler registry, atomic batches,
// errors, call middleware and the byte transport contract.

// ============================================================================
// Endpoint
// ============================================================================

export { Endpoint, type EndpointOptions, type EndpointState } from "./endpoint.ts";
export { Batch, resultTarget, type ResultTarget } from "./batch.ts";
export { registerAtomicHandler } from "./atomic.ts";

// ============================================================================
// Handlers
// ============================================================================

export {
  HandlerRegistry,
  bindArguments,
  type ArgsOf,
  type HandlerContext,
  type HandlerFunction,
  type HandlerSignature,
  type InvokeOutcome,
} from "./registry.ts";

// ============================================================================
// Errors
// ============================================================================

export {
  ConnectionError,
  ApplicationError,
  BatchError,
  errorMessage,
  type ConnectionErrorKind,
  type ApplicationErrorKind,
} from "./errors.ts";

// ============================================================================
// Middleware and logging
// ============================================================================

export {
  Extensions,
  ExtensionKey,
  RejectionError,
  type CallContext,
  type CallMiddleware,
  type CallOutcome,
  type CallRequest,
  type Rejection,
} from "./middleware.ts";
export { tracingMiddleware, type TracingOptions } from "./tracing.ts";
export { debugLogf, isEnabled, matchPattern, noopLogf, stderrLogf, type Logf } from "./logging.ts";

// ============================================================================
// Transports
// ============================================================================

export { memoryPipe, type ByteTransport } from "./transport.ts";
