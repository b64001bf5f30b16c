/**
 * Debug tracing, enabled with MEDIACTL_DEBUG=1.
 * Traces go to stderr so they never mix with command output.
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.MEDIACTL_DEBUG;
  return value !== undefined && value !== '' && value !== '0';
}

export function debugLog(scope: string, message: string, err?: unknown): void {
  if (!isDebugEnabled()) return;
  if (err === undefined) {
    console.error(`[${scope}] ${message}`);
  } else {
    console.error(`[${scope}] ${message}:`, err instanceof Error ? err.message : err);
  }
}
