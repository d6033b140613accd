/**
 * Console logging that keeps medical text out of the output unless explicitly enabled.
 *
 * NEVER pass source text, summaries or answers to debugLog. Use debugLogPHI for those.
 *
 * @example
 * debugLog("Generating summary:", text.length, "chars") // Safe: only logs length
 * debugLogPHI("Source text:", text) // Gated: needs ENABLE_PHI_DEBUG_LOGS=true
 */

type LogEnv = Record<string, string | undefined>

let logEnv: LogEnv = process.env

/**
 * Point the logger at a different environment. Used by tests.
 */
export function setLogEnvironment(env: LogEnv): void {
  logEnv = env
}

export function isDebugEnabled(env: LogEnv = logEnv): boolean {
  return env.NODE_ENV === "development" || env.DEBUG_LOGS === "true"
}

export function isPHIDebugEnabled(env: LogEnv = logEnv): boolean {
  return isDebugEnabled(env) && env.ENABLE_PHI_DEBUG_LOGS === "true"
}

/**
 * Log non-PHI debug information such as counts, ids and status.
 */
export function debugLog(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log(...args)
  }
}

/**
 * Log PHI-sensitive information (medical text, summaries, answers).
 * Only logs when debug logging AND ENABLE_PHI_DEBUG_LOGS=true are both set.
 */
export function debugLogPHI(...args: unknown[]): void {
  if (isPHIDebugEnabled()) {
    console.log("[PHI DEBUG]", ...args)
  }
}

/**
 * Always enabled.
 */
export function debugError(...args: unknown[]): void {
  console.error(...args)
}

/**
 * Always enabled.
 */
export function debugWarn(...args: unknown[]): void {
  console.warn(...args)
}
