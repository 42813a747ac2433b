import { normalizeWord } from './normalize'

/**
 * Edit distance over code points.
 */
export function levenshtein(a: string, b: string): number {
	const left = Array.from(a)
	const right = Array.from(b)
	if (left.length === 0) {
		return right.length
	}
	if (right.length === 0) {
		return left.length
	}
	let previous = Array.from({ length: right.length + 1 }, (_, index) => index)
	for (const [i, leftChar] of left.entries()) {
		const current = [i + 1]
		for (const [j, rightChar] of right.entries()) {
			const cost = leftChar === rightChar ? 0 : 1
			const deletion = (previous[j + 1] ?? 0) + 1
			const insertion = (current[j] ?? 0) + 1
			const substitution = (previous[j] ?? 0) + cost
			current.push(Math.min(deletion, insertion, substitution))
		}
		previous = current
	}
	return previous[right.length] ?? 0
}

/**
 * 1 minus the edit distance divided by the longer normalized length.
 */
export function similarity(a: string, b: string): number {
	const left = normalizeWord(a)
	const right = normalizeWord(b)
	if (left === right) {
		return 1
	}
	const maxLength = Math.max(Array.from(left).length, Array.from(right).length)
	return 1 - levenshtein(left, right) / maxLength
}

export function exact(a: string, b: string): boolean {
	return normalizeWord(a) === normalizeWord(b)
}

/**
 * Highest at the window center, decaying linearly toward the edges.
 */
export function positionWeight(position: number, windowLength: number): number {
	if (windowLength <= 0) {
		return 0
	}
	const center = windowLength / 2
	const weight = 1 - Math.abs(position - center) / (windowLength * 1.5)
	return Math.max(0, weight)
}
