import type { AlignConfig } from '../config'
import { InvariantViolation } from '../errors'
import { detectRepeatedLines } from '../lyrics'
import type { StepProgressReporter } from '../../progress-reporter'
import type {
	LyricsLine,
	MatchResult,
	TimedWord,
	TranscriptCursor,
	TranscriptWord,
} from '../types'
import { findBestWindow } from './window-scorer'

export type LineMatchStep = {
	result: MatchResult
	cursor: TranscriptCursor
}

export type MatchPass = {
	results: MatchResult[]
	cursor: TranscriptCursor
}

export function createCursor(): TranscriptCursor {
	return { position: 0 }
}

export function advanceCursor(
	cursor: TranscriptCursor,
	position: number,
): TranscriptCursor {
	if (position < cursor.position) {
		throw new InvariantViolation(
			`Transcript cursor cannot rewind from ${cursor.position} to ${position}.`,
		)
	}
	return { position }
}

function timeAt(words: readonly TranscriptWord[], position: number) {
	const index = Math.min(Math.floor(position), words.length - 1)
	const word = words[index]
	if (!word) {
		return 0
	}
	const fraction = Math.min(Math.max(position - index, 0), 1)
	return word.start + (word.end - word.start) * fraction
}

function endTimeAt(words: readonly TranscriptWord[], position: number) {
	if (Number.isInteger(position) && position > 0) {
		return words[position - 1]?.end ?? 0
	}
	return timeAt(words, position)
}

/**
 * Keep the lyrics spelling and take the transcript timing. Equal lengths pair
 * positionally; otherwise each lyrics word covers the same relative share of
 * the window.
 */
export function assignWordTimings(
	lineWords: readonly string[],
	windowWords: readonly TranscriptWord[],
): TimedWord[] {
	if (lineWords.length === windowWords.length) {
		return lineWords.map((text, index) => {
			const word = windowWords[index]
			return { text, start: word?.start ?? 0, end: word?.end ?? 0 }
		})
	}
	const toWindowPosition = (linePosition: number) =>
		(linePosition * windowWords.length) / lineWords.length
	return lineWords.map((text, index) => ({
		text,
		start: timeAt(windowWords, toWindowPosition(index)),
		end: endTimeAt(windowWords, toWindowPosition(index + 1)),
	}))
}

export function matchLine(
	line: LyricsLine,
	words: readonly TranscriptWord[],
	cursor: TranscriptCursor,
	options: AlignConfig & { lookahead: number },
): LineMatchStep {
	const best = findBestWindow(line.words, words, cursor.position, options)
	if (!best || best.score < options.matchThreshold) {
		return {
			result: {
				kind: 'unmatched',
				lineIndex: line.index,
				bestScore: best?.score ?? 0,
			},
			cursor,
		}
	}
	return {
		result: {
			kind: 'matched',
			lineIndex: line.index,
			score: best.score,
			window: best.window,
			words: assignWordTimings(line.words, best.window.words),
		},
		cursor: advanceCursor(
			cursor,
			best.window.start + best.window.words.length,
		),
	}
}

/**
 * Later occurrences of a repeated line are accepted at a slightly lower
 * score, down to `repeatedThresholdFloor`. The floor never raises the
 * configured threshold.
 */
export function resolveLineThreshold(
	config: Pick<
		AlignConfig,
		'matchThreshold' | 'repeatedThresholdStep' | 'repeatedThresholdFloor'
	>,
	occurrence: number,
): number {
	if (occurrence <= 0) {
		return config.matchThreshold
	}
	const floor = Math.min(config.repeatedThresholdFloor, config.matchThreshold)
	return Math.max(
		floor,
		config.matchThreshold - config.repeatedThresholdStep * occurrence,
	)
}

/**
 * First pass: match every line in order against the transcript, threading a
 * fresh cursor through the lines.
 */
export function matchLines(
	lines: readonly LyricsLine[],
	words: readonly TranscriptWord[],
	config: AlignConfig,
	reporter?: StepProgressReporter,
): MatchPass {
	const repeated = detectRepeatedLines(lines)
	const results: MatchResult[] = []
	let cursor = createCursor()
	reporter?.start({ stepCount: lines.length, label: 'Matching lines' })
	for (const line of lines) {
		const occurrence = repeated.get(line.index)
		const step = matchLine(line, words, cursor, {
			...config,
			matchThreshold: resolveLineThreshold(config, occurrence ?? 0),
			lookahead:
				occurrence === undefined
					? config.maxLookahead
					: config.repeatedLineLookahead,
		})
		results.push(step.result)
		cursor = step.cursor
		reporter?.step(`Line ${line.index + 1}/${lines.length}`)
	}
	reporter?.finish('Matching complete')
	return { results, cursor }
}
