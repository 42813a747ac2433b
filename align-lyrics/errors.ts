// Fatal error types. Data-quality problems are reported as warnings instead.

export class InputError extends Error {
	constructor(
		message: string,
		public readonly field: string,
	) {
		super(message)
		this.name = 'InputError'
	}
}

export class InvariantViolation extends Error {
	constructor(
		message: string,
		public readonly lineIndex: number | null = null,
	) {
		super(message)
		this.name = 'InvariantViolation'
	}
}

export class AlignConfigError extends Error {
	constructor(
		public readonly option: string,
		public readonly value: unknown,
		reason: string,
	) {
		super(`Config option ${option} ${reason} (got ${String(value)})`)
		this.name = 'AlignConfigError'
	}
}
