/**
 * Error kinds raised while switching. Everything except `LogWriteFailed`
 * aborts the run at the step that raised it.
 */
export type SwitchErrorKind =
  | 'ConfigNotFound'
  | 'ConfigParseError'
  | 'MissingRequiredField'
  | 'BaseDirectoryNotFound'
  | 'NoInstallationsFound'
  | 'InvalidSelection'
  | 'NoSelectionAndNoDefault'
  | 'EnvironmentWritePermissionDenied'
  | 'EnvironmentWriteFailed'
  | 'UnsupportedPlatform'
  | 'LogWriteFailed';

export class SwitchError extends Error {
  readonly kind: SwitchErrorKind;

  constructor(kind: SwitchErrorKind, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SwitchError';
    this.kind = kind;
  }
}

export function isSwitchError(e: unknown): e is SwitchError {
  return e instanceof SwitchError;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === 'string') return new Error(e);
  if (e === null || e === undefined) return new Error('Unknown error');
  return new Error(String(e));
}

export function describeError(e: unknown): string {
  const err = asError(e);
  const text = err.message.replace(/\s*\r?\n\s*/g, ' ').trim();
  return isSwitchError(err) ? `${err.kind}: ${text}` : text;
}
