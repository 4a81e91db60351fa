/**
 * Returns the root directory for runtime files (`data/`, `logs/`).
 * Prefers the `EMBER_ROOT` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const configured = process.env.EMBER_ROOT;
	if (configured) return configured;
	return process.cwd();
}
