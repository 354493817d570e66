// CHANGE: Line-oriented output port
// WHY: SHELL printers write through a sink so tests capture stdout/stderr as arrays
// PURITY: CORE (interface only)

/**
 * Destination for the two output streams of a run.
 */
export interface OutputSink {
	readonly stdout: (line: string) => void;
	readonly stderr: (line: string) => void;
}
