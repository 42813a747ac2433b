/**
 * Receives step updates from long-running work so the CLI can render them
 * (spinner text, progress bar). The alignment core never depends on how.
 */
export type StepProgressReporter = {
	start(options: { stepCount: number; label?: string }): void
	step(label: string): void
	finish(label?: string): void
}
