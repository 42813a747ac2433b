import { test, expect } from 'vitest'
import { DEFAULT_ALIGN_CONFIG } from '../config'
import type {
	LyricsLine,
	MatchResult,
	MatchedLine,
	TimedWord,
	UnmatchedLine,
} from '../types'
import {
	addOpeningBreak,
	distributeLines,
	estimateSecondsPerWord,
	findTranscriptGapBreaks,
	findUnmatchedRuns,
	interpolateGaps,
} from './gap-interpolator'

function createLine(index: number, text: string): LyricsLine {
	const words = text.split(' ')
	return { index, words, text, sourceLine: index, stanzaBreakBefore: false }
}

function createMatched(
	lineIndex: number,
	words: [string, number, number][],
): MatchedLine {
	return {
		kind: 'matched',
		lineIndex,
		score: 1.2,
		window: { start: 0, words: [] },
		words: words.map(([text, start, end]) => ({ text, start, end })),
	}
}

function createUnmatched(lineIndex: number): UnmatchedLine {
	return { kind: 'unmatched', lineIndex, bestScore: 0 }
}

function expectTimings(
	words: readonly TimedWord[] | undefined,
	expected: [string, number, number][],
) {
	expect(words?.map((word) => word.text)).toEqual(
		expected.map(([text]) => text),
	)
	expected.forEach(([, start, end], index) => {
		expect(words?.[index]?.start).toBeCloseTo(start, 6)
		expect(words?.[index]?.end).toBeCloseTo(end, 6)
	})
}

function interpolate(
	lines: LyricsLine[],
	results: MatchResult[],
	streamEnd: number | null,
) {
	return interpolateGaps({
		lines,
		results,
		streamEnd,
		config: DEFAULT_ALIGN_CONFIG,
	})
}

test('findUnmatchedRuns groups consecutive misses with their anchors', () => {
	const runs = findUnmatchedRuns([
		createUnmatched(0),
		createMatched(1, [['a', 1, 2]]),
		createUnmatched(2),
		createUnmatched(3),
		createMatched(4, [['b', 5, 6]]),
		createUnmatched(5),
	])
	expect(runs).toEqual([
		{ lineIndices: [0], previous: null, next: { lineIndex: 1, start: 1, end: 2 } },
		{
			lineIndices: [2, 3],
			previous: { lineIndex: 1, start: 1, end: 2 },
			next: { lineIndex: 4, start: 5, end: 6 },
		},
		{ lineIndices: [5], previous: { lineIndex: 4, start: 5, end: 6 }, next: null },
	])
})

test('estimateSecondsPerWord averages matched lines', () => {
	const results = [
		createMatched(0, [
			['a', 0, 1],
			['b', 1, 2],
		]),
		createUnmatched(1),
		createMatched(2, [['c', 10, 11]]),
	]
	expect(estimateSecondsPerWord(results, 0.5)).toBe(1)
	expect(estimateSecondsPerWord([createUnmatched(0)], 0.5)).toBe(0.5)
})

test('distributeLines shares the span by word count with equal gaps', () => {
	const timed = distributeLines(
		[createLine(0, 'a'), createLine(1, 'b c d')],
		0,
		10,
		0.1,
	)
	expectTimings(timed[0], [['a', 1 / 3, 1 / 3 + 2.25]])
	expectTimings(timed[1], [
		['b', 2 / 3 + 2.25, 2 / 3 + 4.5],
		['c', 2 / 3 + 4.5, 2 / 3 + 6.75],
		['d', 2 / 3 + 6.75, 2 / 3 + 9],
	])
})

test('interpolateGaps fills a run between anchors in proportion to words', () => {
	const lines = [
		createLine(0, 'a b'),
		createLine(1, 'c d'),
		createLine(2, 'e f g h'),
		createLine(3, 'i j'),
	]
	const results = [
		createMatched(0, [
			['a', 0, 1],
			['b', 1, 2],
		]),
		createUnmatched(1),
		createUnmatched(2),
		createMatched(3, [
			['i', 8, 9],
			['j', 9, 10],
		]),
	]
	const { lines: timed, breaks } = interpolate(lines, results, 10)
	expect(breaks).toEqual([])
	expect(timed.map((line) => [line.index, line.provenance, line.score])).toEqual([
		[1, 'interpolated', null],
		[2, 'interpolated', null],
	])
	expectTimings(timed[0]?.words, [
		['c', 2.2, 3.1],
		['d', 3.1, 4.0],
	])
	expectTimings(timed[1]?.words, [
		['e', 4.2, 5.1],
		['f', 5.1, 6.0],
		['g', 6.0, 6.9],
		['h', 6.9, 7.8],
	])
})

test('interpolateGaps keeps a natural pace and records a break in a long gap', () => {
	const lines = [createLine(0, 'a b'), createLine(1, 'c d'), createLine(2, 'e f')]
	const results = [
		createMatched(0, [
			['a', 0, 1],
			['b', 1, 2],
		]),
		createUnmatched(1),
		createMatched(2, [
			['e', 60, 61],
			['f', 61, 62],
		]),
	]
	const { lines: timed, breaks } = interpolate(lines, results, 62)
	const estimate = 2 / 0.9
	const gap = (estimate * 0.1) / 2
	expect(timed[0]?.provenance).toBe('break-adjacent')
	expectTimings(timed[0]?.words, [
		['c', 2 + gap, 3 + gap],
		['d', 3 + gap, 4 + gap],
	])
	expect(breaks).toHaveLength(1)
	expect(breaks[0]?.start).toBeCloseTo(2 + estimate, 6)
	expect(breaks[0]?.end).toBe(60)
	expect(breaks[0]?.afterLine).toBe(1)
})

test('interpolateGaps places a leading run just before the first anchor', () => {
	const lines = [createLine(0, 'a b'), createLine(1, 'c d')]
	const results = [
		createUnmatched(0),
		createMatched(1, [
			['c', 30, 31],
			['d', 31, 32],
		]),
	]
	const { lines: timed, breaks } = interpolate(lines, results, 32)
	const estimate = 2 / 0.9
	const fillStart = 30 - estimate
	const gap = (estimate * 0.1) / 2
	expect(timed[0]?.provenance).toBe('break-adjacent')
	expectTimings(timed[0]?.words, [
		['a', fillStart + gap, fillStart + gap + 1],
		['b', fillStart + gap + 1, fillStart + gap + 2],
	])
	expect(breaks).toHaveLength(1)
	expect(breaks[0]?.start).toBe(0)
	expect(breaks[0]?.end).toBeCloseTo(fillStart, 6)
	expect(breaks[0]?.afterLine).toBeNull()
})

test('interpolateGaps spreads lines over the transcript when nothing matched', () => {
	const lines = [createLine(0, 'a b'), createLine(1, 'c d')]
	const { lines: timed, breaks } = interpolate(
		lines,
		[createUnmatched(0), createUnmatched(1)],
		10,
	)
	expect(breaks).toEqual([])
	expect(timed.map((line) => line.provenance)).toEqual([
		'interpolated',
		'interpolated',
	])
	expectTimings(timed[0]?.words, [
		['a', 1 / 3, 1 / 3 + 2.25],
		['b', 1 / 3 + 2.25, 1 / 3 + 4.5],
	])
	expectTimings(timed[1]?.words, [
		['c', 5 + 1 / 6, 5 + 1 / 6 + 2.25],
		['d', 5 + 1 / 6 + 2.25, 5 + 1 / 6 + 4.5],
	])
})

test('interpolateGaps uses default line spans without a transcript', () => {
	const lines = [createLine(0, 'a'), createLine(1, 'b')]
	const { lines: timed } = interpolate(
		lines,
		[createUnmatched(0), createUnmatched(1)],
		null,
	)
	expectTimings(timed[0]?.words, [['a', 0.8 / 3, 0.8 / 3 + 3.6]])
	expectTimings(timed[1]?.words, [['b', 1.6 / 3 + 3.6, 1.6 / 3 + 7.2]])
})

test('interpolateGaps gives trailing lines a default span after the transcript ends', () => {
	const lines = [createLine(0, 'a b'), createLine(1, 'c d')]
	const results = [
		createMatched(0, [
			['a', 0, 1],
			['b', 1, 2],
		]),
		createUnmatched(1),
	]
	const { lines: timed, breaks } = interpolate(lines, results, 2)
	expect(breaks).toEqual([])
	expect(timed[0]?.provenance).toBe('interpolated')
	expectTimings(timed[0]?.words, [
		['c', 2.2, 4.0],
		['d', 4.0, 5.8],
	])
})

test('findTranscriptGapBreaks marks long silences between matched lines', () => {
	const results: MatchResult[] = [
		createMatched(0, [['one', 0, 1], ['two', 1, 2]]),
		createMatched(1, [['three', 40, 41]]),
		createMatched(2, [['four', 43, 44]]),
	]
	expect(findTranscriptGapBreaks(results, 5)).toEqual([
		{ start: 2, end: 40, afterLine: 0 },
	])
	expect(findTranscriptGapBreaks(results, 2)).toEqual([
		{ start: 2, end: 40, afterLine: 0 },
		{ start: 41, end: 43, afterLine: 1 },
	])
})

test('findTranscriptGapBreaks leaves gaps around unmatched lines alone', () => {
	const results: MatchResult[] = [
		createMatched(0, [['one', 0, 1]]),
		createUnmatched(1),
		createMatched(2, [['three', 40, 41]]),
	]
	expect(findTranscriptGapBreaks(results, 5)).toEqual([])
})

test('addOpeningBreak covers a long lead-in before the transcript', () => {
	const later = { start: 10, end: 20, afterLine: 1 }
	expect(addOpeningBreak([later], 20, 5)).toEqual([
		{ start: -20, end: 0, afterLine: null },
		later,
	])
	expect(addOpeningBreak([later], 4, 5)).toEqual([later])
	expect(addOpeningBreak([later], 0, 0)).toEqual([later])
})

test('addOpeningBreak extends a break that already opens the track', () => {
	expect(
		addOpeningBreak([{ start: 0, end: 8, afterLine: null }], 20, 5),
	).toEqual([{ start: -20, end: 8, afterLine: null }])
})
