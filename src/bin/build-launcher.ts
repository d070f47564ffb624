#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns the exit code; only the binary terminates the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { runLauncher } from "../app/runLauncher.js";

/**
 * CLI entry point for build-launcher.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 unless a usage, configuration or fatal error occurred
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await runLauncher(process.argv.slice(2));
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
