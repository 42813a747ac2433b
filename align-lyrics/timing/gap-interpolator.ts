import type { AlignConfig } from '../config'
import type {
	Anchor,
	InstrumentalBreak,
	LyricsLine,
	MatchResult,
	MatchedLine,
	TimedLine,
	TimedWord,
} from '../types'

export type UnmatchedRun = {
	lineIndices: number[]
	previous: Anchor | null
	next: Anchor | null
}

export type InterpolationOptions = {
	lines: readonly LyricsLine[]
	results: readonly MatchResult[]
	// end of the last transcript word, null when there were no words
	streamEnd: number | null
	config: Pick<
		AlignConfig,
		| 'gapReserve'
		| 'breakRatio'
		| 'minBreakSeconds'
		| 'defaultLineSeconds'
		| 'defaultSecondsPerWord'
	>
}

export type Interpolation = {
	lines: TimedLine[]
	breaks: InstrumentalBreak[]
}

type RunSpan = {
	start: number
	span: number
	align: 'start' | 'end'
	measured: boolean
}

export function anchorFromMatch(match: MatchedLine): Anchor {
	const first = match.words[0]
	const last = match.words.at(-1)
	return {
		lineIndex: match.lineIndex,
		start: first?.start ?? 0,
		end: last?.end ?? 0,
	}
}

/**
 * Group consecutive unmatched lines with the anchors around them.
 */
export function findUnmatchedRuns(
	results: readonly MatchResult[],
): UnmatchedRun[] {
	const runs: UnmatchedRun[] = []
	let previous: Anchor | null = null
	let current: number[] = []
	for (const result of results) {
		if (result.kind === 'unmatched') {
			current.push(result.lineIndex)
			continue
		}
		const anchor = anchorFromMatch(result)
		if (current.length > 0) {
			runs.push({ lineIndices: current, previous, next: anchor })
			current = []
		}
		previous = anchor
	}
	if (current.length > 0) {
		runs.push({ lineIndices: current, previous, next: null })
	}
	return runs
}

/**
 * Seconds per word over all matched lines, or the configured default when
 * nothing matched.
 */
export function estimateSecondsPerWord(
	results: readonly MatchResult[],
	defaultSecondsPerWord: number,
): number {
	let duration = 0
	let wordCount = 0
	for (const result of results) {
		if (result.kind !== 'matched') {
			continue
		}
		const anchor = anchorFromMatch(result)
		duration += anchor.end - anchor.start
		wordCount += result.words.length
	}
	if (wordCount === 0 || duration <= 0) {
		return defaultSecondsPerWord
	}
	return duration / wordCount
}

function resolveRunSpan(
	run: UnmatchedRun,
	streamEnd: number | null,
	defaultSpan: number,
): RunSpan {
	const { previous, next } = run
	if (previous && next) {
		return {
			start: previous.end,
			span: Math.max(0, next.start - previous.end),
			align: 'start',
			measured: true,
		}
	}
	if (next) {
		return { start: 0, span: Math.max(0, next.start), align: 'end', measured: true }
	}
	const start = previous?.end ?? 0
	const available = streamEnd === null ? 0 : streamEnd - start
	if (available > 0) {
		return { start, span: available, align: 'start', measured: true }
	}
	return { start, span: defaultSpan, align: 'start', measured: false }
}

/**
 * Lay lines out inside [fillStart, fillEnd]: the gap reserve becomes k + 1
 * equal gaps, the rest is shared by word count.
 */
export function distributeLines(
	lines: readonly LyricsLine[],
	fillStart: number,
	fillEnd: number,
	gapReserve: number,
): TimedWord[][] {
	const fillSpan = Math.max(0, fillEnd - fillStart)
	const totalWords = lines.reduce((sum, line) => sum + line.words.length, 0)
	const gap = (fillSpan * gapReserve) / (lines.length + 1)
	const lineBudget = fillSpan * (1 - gapReserve)
	const timed: TimedWord[][] = []
	let cursor = fillStart + gap
	for (const line of lines) {
		const duration =
			totalWords > 0 ? (lineBudget * line.words.length) / totalWords : 0
		const lineStart = Math.min(cursor, fillEnd)
		const lineEnd = Math.min(cursor + duration, fillEnd)
		const wordDuration = (lineEnd - lineStart) / line.words.length
		timed.push(
			line.words.map((text, index) => ({
				text,
				start: lineStart + wordDuration * index,
				end:
					index === line.words.length - 1
						? lineEnd
						: lineStart + wordDuration * (index + 1),
			})),
		)
		cursor = lineEnd + gap
	}
	return timed
}

/**
 * Second pass: give every unmatched line synthetic timings between its
 * neighbouring anchors. Spans far longer than the run needs keep the lines
 * at a natural pace and leave the rest as an instrumental break.
 */
export function interpolateGaps(options: InterpolationOptions): Interpolation {
	const { config } = options
	const pace = estimateSecondsPerWord(
		options.results,
		config.defaultSecondsPerWord,
	)
	const timedLines: TimedLine[] = []
	const breaks: InstrumentalBreak[] = []

	for (const run of findUnmatchedRuns(options.results)) {
		const runLines = run.lineIndices
			.map((index) => options.lines[index])
			.filter((line): line is LyricsLine => line !== undefined)
		if (runLines.length === 0) {
			continue
		}
		const runWords = runLines.reduce((sum, line) => sum + line.words.length, 0)
		const { start, span, align, measured } = resolveRunSpan(
			run,
			options.streamEnd,
			runLines.length * config.defaultLineSeconds,
		)
		const boundEnd = start + span
		const estimate = (runWords * pace) / (1 - config.gapReserve)
		const isBreak =
			measured &&
			(run.previous !== null || run.next !== null) &&
			span > estimate * config.breakRatio &&
			span - estimate >= config.minBreakSeconds
		const fillSpan = isBreak ? estimate : span
		const fillStart =
			align === 'end' ? Math.max(start, boundEnd - fillSpan) : start
		const fillEnd = Math.min(fillStart + fillSpan, boundEnd)

		let breakAdjacentLine: number | null = null
		if (isBreak) {
			const lastLine = runLines.at(-1)
			if (align === 'end') {
				breaks.push({
					start,
					end: fillStart,
					afterLine: run.previous?.lineIndex ?? null,
				})
				breakAdjacentLine = runLines[0]?.index ?? null
			} else {
				breaks.push({
					start: fillEnd,
					end: boundEnd,
					afterLine: lastLine?.index ?? null,
				})
				breakAdjacentLine = lastLine?.index ?? null
			}
		}

		const distributed = distributeLines(
			runLines,
			fillStart,
			fillEnd,
			config.gapReserve,
		)
		runLines.forEach((line, position) => {
			timedLines.push({
				index: line.index,
				words: distributed[position] ?? [],
				provenance:
					line.index === breakAdjacentLine ? 'break-adjacent' : 'interpolated',
				score: null,
			})
		})
	}

	return { lines: timedLines, breaks }
}

/**
 * Breaks between adjacent matched lines whose transcript words are at least
 * `minBreakSeconds` apart. Gaps holding unmatched lines are left to
 * interpolateGaps.
 */
export function findTranscriptGapBreaks(
	results: readonly MatchResult[],
	minBreakSeconds: number,
): InstrumentalBreak[] {
	const breaks: InstrumentalBreak[] = []
	let previous: Anchor | null = null
	for (const result of results) {
		if (result.kind === 'unmatched') {
			previous = null
			continue
		}
		const anchor = anchorFromMatch(result)
		if (previous && anchor.start - previous.end >= minBreakSeconds) {
			breaks.push({
				start: previous.end,
				end: anchor.start,
				afterLine: previous.lineIndex,
			})
		}
		previous = anchor
	}
	return breaks
}

/**
 * Turn a lead-in of at least `minBreakSeconds` before the transcript into an
 * opening break. Times here are relative to the transcript, so the lead-in
 * ends at 0. A break that already opens the track is extended back over it.
 */
export function addOpeningBreak(
	breaks: readonly InstrumentalBreak[],
	startOffset: number,
	minBreakSeconds: number,
): InstrumentalBreak[] {
	if (startOffset <= 0 || startOffset < minBreakSeconds) {
		return [...breaks]
	}
	const opening = breaks.find(
		(instrumental) => instrumental.afterLine === null && instrumental.start === 0,
	)
	if (opening) {
		return breaks.map((instrumental) =>
			instrumental === opening
				? { ...instrumental, start: -startOffset }
				: instrumental,
		)
	}
	return [{ start: -startOffset, end: 0, afterLine: null }, ...breaks]
}
