const DEBUG_ENV = "MODALCHAT_DEBUG"

const isEnabled = (): boolean => {
  const value = (process.env[DEBUG_ENV] ?? "").trim().toLowerCase()
  return value === "1" || value === "true"
}

/**
 * JSON-lines diagnostics on stderr, off unless `MODALCHAT_DEBUG=1`. Stderr keeps them out of the
 * Ink frame, which is drawn on stdout.
 */
export const debugLog = (scope: string, payload: Record<string, unknown>): void => {
  if (!isEnabled()) return
  console.error(JSON.stringify({ ts: new Date().toISOString(), scope, ...payload }))
}
