import type { AlignConfig } from '../config'
import type { MatchWindow, TranscriptWord } from '../types'
import { normalizeWord } from './normalize'
import { positionWeight, similarity } from './similarity'

export type WindowScoreOptions = Pick<
	AlignConfig,
	'exactMatchMultiplier' | 'wholeLineBonus'
>

export type WindowScore = {
	score: number
	// positions that took part in scoring (both sides non-empty)
	scoredCount: number
	exactCount: number
}

export type WindowSearchOptions = WindowScoreOptions &
	Pick<AlignConfig, 'windowShrink' | 'windowGrow'> & {
		lookahead: number
	}

export type WindowCandidate = {
	window: MatchWindow
	score: number
}

/**
 * Score a lyrics line against a transcript window by pairing words
 * positionally. Windows shorter than the line are scaled by the share of
 * line words they cover.
 */
export function scoreWindow(
	lineWords: readonly string[],
	windowWords: readonly TranscriptWord[],
	options: WindowScoreOptions,
): WindowScore {
	const lineLength = lineWords.length
	const windowLength = windowWords.length
	const overlap = Math.min(lineLength, windowLength)
	let totalScore = 0
	let totalWeight = 0
	let scoredCount = 0
	let exactCount = 0

	for (let index = 0; index < overlap; index += 1) {
		const lineWord = lineWords[index]
		const transcriptWord = windowWords[index]
		if (lineWord === undefined || !transcriptWord) {
			continue
		}
		const lineNormalized = normalizeWord(lineWord)
		const transcriptNormalized = normalizeWord(transcriptWord.text)
		if (!lineNormalized || !transcriptNormalized) {
			continue
		}
		const weight = positionWeight(index, windowLength)
		const isExact = lineNormalized === transcriptNormalized
		const wordSimilarity = isExact
			? Math.min(
					1,
					similarity(lineWord, transcriptWord.text) *
						options.exactMatchMultiplier,
				)
			: similarity(lineWord, transcriptWord.text)
		totalScore += wordSimilarity * weight * transcriptWord.confidence
		totalWeight += weight
		scoredCount += 1
		if (isExact) {
			exactCount += 1
		}
	}

	if (totalWeight === 0) {
		return { score: 0, scoredCount, exactCount }
	}

	let score = totalScore / totalWeight
	if (windowLength >= lineLength && exactCount === scoredCount) {
		score *= options.wholeLineBonus
	}
	score *= overlap / lineLength
	return { score, scoredCount, exactCount }
}

/**
 * Window sizes ordered by distance from the line length, exact length first
 * so it wins ties.
 */
export function candidateWindowSizes(
	lineLength: number,
	options: Pick<AlignConfig, 'windowShrink' | 'windowGrow'>,
): number[] {
	const sizes: number[] = []
	const maxDelta = Math.max(options.windowShrink, options.windowGrow)
	for (let delta = 0; delta <= maxDelta; delta += 1) {
		const candidates =
			delta === 0
				? [lineLength]
				: [
						...(delta <= options.windowShrink ? [lineLength - delta] : []),
						...(delta <= options.windowGrow ? [lineLength + delta] : []),
					]
		for (const size of candidates) {
			if (size >= 1 && !sizes.includes(size)) {
				sizes.push(size)
			}
		}
	}
	return sizes
}

/**
 * Search window starts from the cursor up to `lookahead` words ahead and
 * return the first window with the highest score, or null when no transcript
 * words remain.
 */
export function findBestWindow(
	lineWords: readonly string[],
	words: readonly TranscriptWord[],
	cursor: number,
	options: WindowSearchOptions,
): WindowCandidate | null {
	if (lineWords.length === 0) {
		return null
	}
	const sizes = candidateWindowSizes(lineWords.length, options)
	const lastStart = Math.min(words.length, cursor + options.lookahead)
	let best: WindowCandidate | null = null

	for (let start = cursor; start < lastStart; start += 1) {
		const remaining = words.length - start
		const tried = new Set<number>()
		for (const size of sizes) {
			const clipped = Math.min(size, remaining)
			if (tried.has(clipped)) {
				continue
			}
			tried.add(clipped)
			const windowWords = words.slice(start, start + clipped)
			const { score } = scoreWindow(lineWords, windowWords, options)
			if (!best || score > best.score) {
				best = { window: { start, words: windowWords }, score }
			}
		}
	}
	return best
}
