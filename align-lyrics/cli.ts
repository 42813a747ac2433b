import type { Argv, Arguments } from 'yargs'
import { resolveAlignConfig, type AlignConfig } from './config'

export const TRANSCRIPT_EXTENSIONS = ['.json']

export interface AlignCliArgs {
	inputPaths: string[]
	outputDir: string | null
	config: AlignConfig
	showBreaks: boolean
	writeReport: boolean
	writeLogs: boolean
	dryRun: boolean
}

export function configureMatchingOptions<T>(command: Argv<T>) {
	return command
		.option('threshold', {
			type: 'number',
			alias: 't',
			describe: 'Minimum window score for a line to count as matched',
		})
		.option('lookahead', {
			type: 'number',
			describe: 'Transcript words searched ahead of the cursor per line',
		})
		.option('gap-reserve', {
			type: 'number',
			describe: 'Share of an interpolated span kept as gaps between lines',
		})
		.option('break-ratio', {
			type: 'number',
			describe:
				'Span-to-estimate ratio above which a gap becomes an instrumental break',
		})
}

export function configureAlignCommand(command: Argv) {
	return configureMatchingOptions(command)
		.positional('input', {
			type: 'string',
			array: true,
			describe: 'Transcript record JSON file(s)',
		})
		.option('output-dir', {
			type: 'string',
			alias: 'o',
			describe:
				'Output directory (optional - defaults to the directory of each input file)',
		})
		.option('show-breaks', {
			type: 'boolean',
			describe: 'Write instrumental break marker lines into the LRC output',
			default: false,
		})
		.option('report', {
			type: 'boolean',
			alias: 'r',
			describe: 'Write a JSON alignment report beside each LRC file',
			default: false,
		})
		.option('write-logs', {
			type: 'boolean',
			alias: 'l',
			describe: 'Write a summary log into the output directory',
			default: false,
		})
		.option('dry-run', {
			type: 'boolean',
			alias: 'd',
			describe: 'Align and report without writing any files',
			default: false,
		})
}

function optionalNumber(argv: Arguments, key: string) {
	const value = argv[key]
	if (value === undefined) {
		return undefined
	}
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw new Error(`${key} must be a number.`)
	}
	return value
}

export function collectInputPaths(value: unknown) {
	if (Array.isArray(value)) {
		return value.filter(
			(entry): entry is string =>
				typeof entry === 'string' && entry.trim().length > 0,
		)
	}
	if (typeof value === 'string' && value.trim().length > 0) {
		return [value]
	}
	return []
}

export function resolveConfigOverrides(argv: Arguments): AlignConfig {
	const lookahead = optionalNumber(argv, 'lookahead')
	return resolveAlignConfig({
		matchThreshold: optionalNumber(argv, 'threshold'),
		maxLookahead: lookahead,
		// a wider base search also widens the search for repeated lines
		repeatedLineLookahead:
			lookahead === undefined
				? undefined
				: Math.max(lookahead, Math.round(lookahead * 1.5)),
		gapReserve: optionalNumber(argv, 'gap-reserve'),
		breakRatio: optionalNumber(argv, 'break-ratio'),
	})
}

export function normalizeAlignArgs(argv: Arguments): AlignCliArgs {
	const inputPaths = collectInputPaths(argv.input)
	if (inputPaths.length === 0) {
		throw new Error('At least one transcript file is required.')
	}
	const outputDir =
		typeof argv['output-dir'] === 'string' &&
		argv['output-dir'].trim().length > 0
			? argv['output-dir'].trim()
			: null

	return {
		inputPaths,
		outputDir,
		config: resolveConfigOverrides(argv),
		showBreaks: Boolean(argv['show-breaks']),
		writeReport: Boolean(argv.report),
		writeLogs: Boolean(argv['write-logs']),
		dryRun: Boolean(argv['dry-run']),
	}
}
