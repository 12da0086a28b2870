/**
 * Stack trace capture helper.
 *
 * Wraps V8's Error.captureStackTrace so error constructors can drop their
 * own frames from the trace. Outside V8 this is a no-op and the stack
 * populated by the Error constructor is kept.
 */

/**
 * Capture a stack trace on `error`, omitting `constructorOpt` and every frame above it.
 *
 * @example
 * ```typescript
 * class PlanError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     captureStackTrace(this, PlanError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (typeof Error.captureStackTrace === 'function') {
    Error.captureStackTrace(error, constructorOpt);
  }
}
