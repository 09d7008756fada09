/**
 * Opt-in diagnostics for the conversion pipeline.
 *
 * Set `ANNOTEXT_DEBUG_CONVERT` to any non-empty value to enable. The switch is
 * read on every call so tests and hosts can toggle it at run time.
 */

export const CONVERT_DEBUG_ENV = 'ANNOTEXT_DEBUG_CONVERT';

export function isConvertDebugEnabled(): boolean {
  return typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env[CONVERT_DEBUG_ENV]);
}

export const convertLog = (...args: unknown[]): void => {
  if (!isConvertDebugEnabled()) return;

  console.log(...args);
};
