export function formatSeconds(value: number) {
	return `${value.toFixed(2)}s`
}

export function clamp(value: number, min: number, max: number) {
	return Math.min(Math.max(value, min), max)
}

export function formatPercent(part: number, total: number) {
	if (total <= 0) {
		return '0%'
	}
	return `${Math.round((part / total) * 100)}%`
}

/**
 * Keep letters, digits, spaces, dashes and underscores so artist and track
 * names can be used in file names.
 */
export function sanitizeFileNamePart(value: string) {
	return value
		.replace(/[^\p{L}\p{N} _-]+/gu, '')
		.replace(/\s+/g, ' ')
		.trim()
}
