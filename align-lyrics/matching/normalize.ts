const NON_WORD_CHARACTERS = /[^\p{L}\p{M}\p{N}]+/gu

/**
 * Canonical comparison form of a word: case-folded with punctuation and
 * whitespace removed. Letters of any script are kept.
 */
export function normalizeWord(text: string): string {
	return text.toLowerCase().replace(NON_WORD_CHARACTERS, '').trim()
}

export function normalizeLine(text: string): string {
	return text
		.split(/\s+/)
		.map(normalizeWord)
		.filter(Boolean)
		.join(' ')
}
