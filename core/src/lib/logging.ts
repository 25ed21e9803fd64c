/**
 * Console logging helpers
 *
 * Debug output is opt-in via DEBUG=true; warnings always print.
 */

export function isDebugEnabled(): boolean {
  return process.env.DEBUG === 'true';
}

export function logDebug(message: string, data?: unknown): void {
  if (!isDebugEnabled()) {
    return;
  }
  if (data === undefined) {
    console.debug(`[DEBUG] ${message}`);
  } else {
    console.debug(`[DEBUG] ${message}`, data);
  }
}

export function logWarn(message: string, data?: unknown): void {
  if (data === undefined) {
    console.warn(`[WARN] ${message}`);
  } else {
    console.warn(`[WARN] ${message}`, data);
  }
}
