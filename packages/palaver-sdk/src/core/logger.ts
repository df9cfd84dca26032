/**
 * SDK diagnostic logger.
 *
 * Logs to `console.info/warn/error` with a `[Palaver]` prefix so host
 * applications can filter engine output from their own.
 *
 * **Privacy**: Never pass status messages or contact JID local parts to
 * these functions. Room JIDs (service addresses) are acceptable.
 *
 * Protocol-level traces are not logged here; modules emit them as
 * `console:event` SDK events instead.
 *
 * @module Core/Logger
 */

const PREFIX = '[Palaver]'

export function logInfo(message: string): void {
  console.info(PREFIX, message)
}

export function logWarn(message: string): void {
  console.warn(PREFIX, message)
}

export function logError(message: string): void {
  console.error(PREFIX, message)
}
