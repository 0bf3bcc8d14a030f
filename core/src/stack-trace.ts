/**
 * Stack trace capture for the table error classes.
 *
 * Wraps V8's `Error.captureStackTrace` so error constructors can drop their
 * own frames without reaching for `any`.
 */

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasCaptureStackTrace(
  errorConstructor: typeof Error
): errorConstructor is typeof Error & V8ErrorConstructor {
  return typeof (errorConstructor as unknown as V8ErrorConstructor).captureStackTrace === 'function';
}

/**
 * Record the stack on `error`, omitting `constructorOpt` and every frame above it.
 * No-op outside V8; the `Error` constructor has already set `stack` there.
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: Function
): void {
  if (hasCaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
