import { InvariantViolation } from '../errors'
import type {
	InstrumentalBreak,
	LyricsLine,
	MatchResult,
	TimedLine,
	TimedWord,
	TimingTrack,
	TrackMetadata,
} from '../types'

export type AssembleOptions = {
	metadata: TrackMetadata
	lyrics: readonly LyricsLine[]
	results: readonly MatchResult[]
	interpolated: readonly TimedLine[]
	breaks: readonly InstrumentalBreak[]
	streamEnd: number | null
	// added to every time, moving the track from transcript to song time
	offsetSeconds?: number
}

function isValidTime(value: number) {
	return Number.isFinite(value) && value >= 0
}

/**
 * Check every ordering and completeness invariant of a track. Throws on the
 * first violation.
 */
export function validateTrack(
	lyrics: readonly LyricsLine[],
	lines: readonly TimedLine[],
) {
	if (lines.length !== lyrics.length) {
		throw new InvariantViolation(
			`Track has ${lines.length} lines, expected ${lyrics.length}.`,
		)
	}
	let previousEnd = 0
	for (const [position, line] of lines.entries()) {
		const source = lyrics[position]
		if (!source || line.index !== source.index) {
			throw new InvariantViolation(
				`Line at position ${position} has index ${line.index}.`,
				line.index,
			)
		}
		if (line.words.length !== source.words.length) {
			throw new InvariantViolation(
				`Line ${line.index} has ${line.words.length} words, expected ${source.words.length}.`,
				line.index,
			)
		}
		for (const [wordIndex, word] of line.words.entries()) {
			if (word.text !== source.words[wordIndex]) {
				throw new InvariantViolation(
					`Line ${line.index} word ${wordIndex} is "${word.text}", expected "${source.words[wordIndex]}".`,
					line.index,
				)
			}
			if (!isValidTime(word.start) || !isValidTime(word.end)) {
				throw new InvariantViolation(
					`Line ${line.index} word ${wordIndex} has an invalid timestamp.`,
					line.index,
				)
			}
			if (word.end < word.start) {
				throw new InvariantViolation(
					`Line ${line.index} word ${wordIndex} ends before it starts.`,
					line.index,
				)
			}
			if (word.start < previousEnd) {
				throw new InvariantViolation(
					`Line ${line.index} word ${wordIndex} starts at ${word.start} before the previous word ends at ${previousEnd}.`,
					line.index,
				)
			}
			previousEnd = word.end
		}
	}
}

function shiftWords(words: readonly TimedWord[], offset: number): TimedWord[] {
	return words.map((word) => ({
		text: word.text,
		start: word.start + offset,
		end: word.end + offset,
	}))
}

/**
 * Merge matched and interpolated lines back into lyrics order, shift them by
 * the offset and validate the result.
 */
export function assembleTrack(options: AssembleOptions): TimingTrack {
	const offset = options.offsetSeconds ?? 0
	const byIndex = new Map<number, TimedLine>()
	for (const result of options.results) {
		if (result.kind === 'matched') {
			byIndex.set(result.lineIndex, {
				index: result.lineIndex,
				words: shiftWords(result.words, offset),
				provenance: 'matched',
				score: result.score,
			})
		}
	}
	for (const line of options.interpolated) {
		if (byIndex.has(line.index)) {
			throw new InvariantViolation(
				`Line ${line.index} is both matched and interpolated.`,
				line.index,
			)
		}
		byIndex.set(line.index, { ...line, words: shiftWords(line.words, offset) })
	}

	const lines: TimedLine[] = []
	for (const source of options.lyrics) {
		const line = byIndex.get(source.index)
		if (!line) {
			throw new InvariantViolation(
				`Line ${source.index} has no timing.`,
				source.index,
			)
		}
		lines.push(line)
	}
	validateTrack(options.lyrics, lines)

	const breaks = options.breaks
		.map((instrumental) => ({
			...instrumental,
			start: instrumental.start + offset,
			end: instrumental.end + offset,
		}))
		.sort((a, b) => a.start - b.start)
	const lastWordEnd = lines.at(-1)?.words.at(-1)?.end ?? 0
	const lastBreakEnd = breaks.at(-1)?.end ?? 0
	const streamEnd =
		options.streamEnd === null ? 0 : options.streamEnd + offset
	return {
		metadata: { ...options.metadata },
		lines,
		breaks,
		duration: Math.max(streamEnd, lastWordEnd, lastBreakEnd),
	}
}
