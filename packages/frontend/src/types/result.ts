/**
 * Result type for functional error handling
 */

import {
  createDiagnostic,
  type Diagnostic,
  type DiagnosticCode,
} from "./diagnostic.js";

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

/**
 * Failed result holding a single error diagnostic
 */
export const fail = <T>(
  code: DiagnosticCode,
  message: string,
  detail?: string
): Result<T, Diagnostic> =>
  error(createDiagnostic(code, message, detail === undefined ? {} : { detail }));
