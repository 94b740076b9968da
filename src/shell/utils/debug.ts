// CHANGE: Debug tracing gated by GUIDELINT_DEBUG
// PURITY: SHELL (writes to stderr, reads process.env)
// INVARIANT: Silent unless GUIDELINT_DEBUG=1

export const DEBUG_ENV_VAR = "GUIDELINT_DEBUG";

export function isDebugEnabled(): boolean {
	return process.env[DEBUG_ENV_VAR] === "1";
}

/**
 * Writes a trace line to stderr when debugging is enabled.
 *
 * @pure false
 */
export function debugLog(message: string): void {
	if (!isDebugEnabled()) return;
	console.error(`🔍 [guidelint] ${message}`);
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
