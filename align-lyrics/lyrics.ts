import { InputError } from './errors'
import { normalizeLine } from './matching/normalize'
import type { LyricsLine } from './types'

/**
 * Split lyrics text into word lines. Blank lines are dropped but remembered
 * as stanza breaks on the following line.
 */
export function parseLyrics(text: string): LyricsLine[] {
	const lines: LyricsLine[] = []
	let pendingBreak = false
	for (const [sourceLine, rawLine] of text.split(/\r?\n/).entries()) {
		const trimmed = rawLine.trim()
		const words = trimmed.split(/\s+/).filter(Boolean)
		if (words.length === 0) {
			pendingBreak = lines.length > 0
			continue
		}
		lines.push({
			index: lines.length,
			words,
			text: words.join(' '),
			sourceLine,
			stanzaBreakBefore: pendingBreak,
		})
		pendingBreak = false
	}
	if (lines.length === 0) {
		throw new InputError(
			'Lyrics text has no words.',
			'metadata.original_lyrics',
		)
	}
	return lines
}

/**
 * Map each line whose normalized text appears more than once to its
 * occurrence number (0 for the first occurrence).
 */
export function detectRepeatedLines(
	lines: readonly LyricsLine[],
): Map<number, number> {
	const occurrences = new Map<string, number[]>()
	for (const line of lines) {
		const key = normalizeLine(line.text)
		if (!key) {
			continue
		}
		const indices = occurrences.get(key) ?? []
		indices.push(line.index)
		occurrences.set(key, indices)
	}
	const repeated = new Map<number, number>()
	for (const indices of occurrences.values()) {
		if (indices.length < 2) {
			continue
		}
		indices.forEach((lineIndex, occurrence) => {
			repeated.set(lineIndex, occurrence)
		})
	}
	return repeated
}
