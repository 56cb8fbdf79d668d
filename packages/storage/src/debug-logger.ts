/**
 * Console logging that keeps PHI out of normal output.
 *
 * NEVER pass transcripts, record contents or patient names to console.log directly.
 * Use debugLogPHI, which only prints in development with VISIT_DEBUG_LOGS=true.
 *
 * @example
 * debugLog("Merged fields:", Object.keys(updates)) // Safe: field names only
 * debugLogPHI("Transcript:", transcript) // Gated
 */

const isDevelopment = (): boolean => process.env.NODE_ENV !== "production"

const isPHIDebugEnabled = (): boolean => process.env.VISIT_DEBUG_LOGS === "true"

/**
 * Log non-PHI metadata such as counts, IDs and status. Silent in production.
 */
export function debugLog(...args: unknown[]): void {
  if (isDevelopment()) {
    console.log(...args)
  }
}

/**
 * Log PHI-sensitive information. Requires VISIT_DEBUG_LOGS=true outside production.
 */
export function debugLogPHI(...args: unknown[]): void {
  if (isDevelopment() && isPHIDebugEnabled()) {
    console.log("[PHI DEBUG]", ...args)
  }
}

export function debugError(...args: unknown[]): void {
  console.error(...args)
}

export function debugWarn(...args: unknown[]): void {
  console.warn(...args)
}
