// CHANGE: Console-backed diagnostic sink and output channel
// WHY: APP and tests swap these for recording implementations
// PURITY: SHELL
// INVARIANT: All terminal IO of the launcher goes through these two functions
// COMPLEXITY: O(1) per message

/**
 * Receives human-readable error text. The parser core never reads it back.
 */
export interface DiagnosticSink {
	readonly error: (message: string) => void;
}

/**
 * Plain line output for help, version and command summaries.
 */
export type OutputLine = (line: string) => void;

export function createConsoleSink(): DiagnosticSink {
	return {
		error: (message) => {
			console.error(`❌ ${message}`);
		},
	};
}

export function createConsoleOutput(): OutputLine {
	return (line) => {
		console.log(line);
	};
}
