/**
 * Stack trace capture for Tuplet error classes.
 *
 * V8 runtimes expose `Error.captureStackTrace`, which drops the error
 * constructor frames from the recorded stack. Elsewhere the stack recorded by
 * the `Error` constructor is kept as it is.
 */

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasCaptureStackTrace(
  errorConstructor: typeof Error
): errorConstructor is typeof Error & V8ErrorConstructor {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Record the stack on `error`, omitting `constructorOpt` and every frame above it.
 *
 * @example
 * ```typescript
 * class AdapterLoadError extends ConfigurationError {
 *   constructor(message: string) {
 *     super(message);
 *     captureStackTrace(this, AdapterLoadError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (hasCaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
