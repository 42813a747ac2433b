import { resolveAlignConfig, type AlignConfig } from './config'
import { parseLyrics } from './lyrics'
import { matchLines } from './matching/sliding-matcher'
import {
	addOpeningBreak,
	findTranscriptGapBreaks,
	interpolateGaps,
} from './timing/gap-interpolator'
import { assembleTrack } from './timing/timing-assembler'
import { parseTranscriptRecord } from './transcript-input'
import type { StepProgressReporter } from '../progress-reporter'
import type {
	AlignmentReport,
	DataQualityWarning,
	LyricsLine,
	MatchResult,
	TimingTrack,
	TranscriptRecord,
} from './types'

export type AlignOptions = {
	config?: Partial<AlignConfig>
	reporter?: StepProgressReporter
}

export type AlignmentResult = {
	track: TimingTrack
	report: AlignmentReport
	results: MatchResult[]
	lyrics: LyricsLine[]
	startOffset: number
}

function buildReport(
	results: readonly MatchResult[],
	breakCount: number,
	warnings: DataQualityWarning[],
): AlignmentReport {
	const matchedLines = results.filter(
		(result) => result.kind === 'matched',
	).length
	return {
		matchedLines,
		interpolatedLines: results.length - matchedLines,
		breakCount,
		degraded: warnings.some(
			(warning) =>
				warning.kind === 'no-transcript-words' ||
				warning.kind === 'all-lines-unmatched',
		),
		warnings,
	}
}

/**
 * Align a validated transcript record: match lines, interpolate the rest,
 * find breaks, then assemble and validate the track in song time.
 */
export function alignRecord(
	record: TranscriptRecord,
	options: AlignOptions = {},
	inputWarnings: DataQualityWarning[] = [],
): AlignmentResult {
	const config = resolveAlignConfig(options.config)
	const lyrics = parseLyrics(record.metadata.originalLyrics)
	const { words } = record
	const warnings = [...inputWarnings]
	if (words.length === 0) {
		warnings.push({
			kind: 'no-transcript-words',
			message: 'Transcript has no usable words; all lines are interpolated.',
		})
	}

	const { results } = matchLines(lyrics, words, config, options.reporter)
	if (words.length > 0 && results.every((result) => result.kind === 'unmatched')) {
		warnings.push({
			kind: 'all-lines-unmatched',
			message: `No line reached the match threshold (${config.matchThreshold}); all lines are interpolated.`,
		})
	}

	const streamEnd = words.at(-1)?.end ?? null
	const interpolation = interpolateGaps({
		lines: lyrics,
		results,
		streamEnd,
		config,
	})
	const { startOffset } = record.metadata
	const breaks = addOpeningBreak(
		[
			...interpolation.breaks,
			...findTranscriptGapBreaks(results, config.minBreakSeconds),
		],
		startOffset,
		config.minBreakSeconds,
	)
	const track = assembleTrack({
		metadata: { artist: record.metadata.artist, track: record.metadata.track },
		lyrics,
		results,
		interpolated: interpolation.lines,
		breaks,
		streamEnd,
		offsetSeconds: startOffset,
	})

	return {
		track,
		report: buildReport(results, track.breaks.length, warnings),
		results,
		lyrics,
		startOffset,
	}
}

/**
 * Align a raw transcript record (as read from JSON).
 */
export function alignLyrics(
	payload: unknown,
	options: AlignOptions = {},
): AlignmentResult {
	const config = resolveAlignConfig(options.config)
	const { record, warnings } = parseTranscriptRecord(payload, {
		defaultConfidence: config.defaultConfidence,
	})
	return alignRecord(record, { ...options, config }, warnings)
}
