import { clamp } from '../utils'
import { InputError } from './errors'
import type {
	DataQualityWarning,
	TranscriptRecord,
	TranscriptWord,
} from './types'

export type RawTranscriptWord = {
	text: string
	originalText: string | null
	start: number
	end: number
	confidence: number
}

export type ParsedTranscript = {
	record: TranscriptRecord
	warnings: DataQualityWarning[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

function requireString(
	source: Record<string, unknown>,
	key: string,
	field: string,
): string {
	const value = source[key]
	if (typeof value !== 'string') {
		throw new InputError(`Transcript record missing ${field}.`, field)
	}
	return value
}

function readStartOffset(metadata: Record<string, unknown>): number {
	const timingInfo = metadata.timing_info
	if (timingInfo === undefined || timingInfo === null) {
		return 0
	}
	if (!isRecord(timingInfo)) {
		throw new InputError(
			'Transcript record has invalid metadata.timing_info.',
			'metadata.timing_info',
		)
	}
	const offset = timingInfo.start_offset
	if (offset === undefined) {
		return 0
	}
	if (typeof offset !== 'number' || !Number.isFinite(offset) || offset < 0) {
		throw new InputError(
			'Transcript record has invalid metadata.timing_info.start_offset.',
			'metadata.timing_info.start_offset',
		)
	}
	return offset
}

function readWord(
	entry: unknown,
	index: number,
	defaultConfidence: number,
): RawTranscriptWord {
	const field = `words[${index}]`
	if (!isRecord(entry)) {
		throw new InputError(`Transcript word ${index} is invalid.`, field)
	}
	const text = entry.word
	if (typeof text !== 'string') {
		throw new InputError(`Transcript word ${index} missing word.`, `${field}.word`)
	}
	const { start, end } = entry
	if (typeof start !== 'number' || typeof end !== 'number') {
		throw new InputError(`Transcript word ${index} missing timing.`, field)
	}
	const confidence = entry.confidence ?? defaultConfidence
	if (typeof confidence !== 'number' || Number.isNaN(confidence)) {
		throw new InputError(
			`Transcript word ${index} has invalid confidence.`,
			`${field}.confidence`,
		)
	}
	const originalText = entry.original_word ?? null
	if (originalText !== null && typeof originalText !== 'string') {
		throw new InputError(
			`Transcript word ${index} has invalid original_word.`,
			`${field}.original_word`,
		)
	}
	return {
		text,
		originalText,
		start,
		end,
		confidence: clamp(confidence, 0, 1),
	}
}

/**
 * Repair timestamps so the stream is ordered and non-overlapping. Words with
 * unusable times are dropped; every repair is reported.
 */
export function sanitizeTranscriptWords(raw: readonly RawTranscriptWord[]): {
	words: TranscriptWord[]
	warnings: DataQualityWarning[]
} {
	const words: TranscriptWord[] = []
	const warnings: DataQualityWarning[] = []
	let previousEnd = 0
	for (const [wordIndex, entry] of raw.entries()) {
		if (
			!Number.isFinite(entry.start) ||
			!Number.isFinite(entry.end) ||
			entry.start < 0 ||
			entry.end < 0
		) {
			warnings.push({
				kind: 'invalid-timestamp',
				message: `Dropped word ${wordIndex} "${entry.text}" with invalid timing (${entry.start} -> ${entry.end}).`,
				wordIndex,
			})
			continue
		}
		let start = entry.start
		let end = entry.end
		if (end < start) {
			warnings.push({
				kind: 'inverted-timestamp',
				message: `Word ${wordIndex} "${entry.text}" ends before it starts; end raised to start.`,
				wordIndex,
			})
			end = start
		}
		if (start < previousEnd) {
			warnings.push({
				kind: 'overlapping-timestamp',
				message: `Word ${wordIndex} "${entry.text}" starts before the previous word ends; moved to ${previousEnd}.`,
				wordIndex,
			})
			start = previousEnd
			end = Math.max(end, start)
		}
		words.push({
			index: words.length,
			text: entry.text,
			originalText: entry.originalText,
			start,
			end,
			confidence: entry.confidence,
		})
		previousEnd = end
	}
	return { words, warnings }
}

/**
 * Validate a transcript record and build the sanitized word stream.
 */
export function parseTranscriptRecord(
	payload: unknown,
	options: { defaultConfidence: number },
): ParsedTranscript {
	if (!isRecord(payload)) {
		throw new InputError('Transcript record is not an object.', 'record')
	}
	const metadata = payload.metadata
	if (!isRecord(metadata)) {
		throw new InputError('Transcript record missing metadata.', 'metadata')
	}
	const artist = requireString(metadata, 'artist', 'metadata.artist')
	const track = requireString(metadata, 'track', 'metadata.track')
	const originalLyrics = requireString(
		metadata,
		'original_lyrics',
		'metadata.original_lyrics',
	)
	if (!originalLyrics.trim()) {
		throw new InputError(
			'Transcript record has empty original lyrics.',
			'metadata.original_lyrics',
		)
	}
	const startOffset = readStartOffset(metadata)
	const wordList = payload.words
	if (!Array.isArray(wordList)) {
		throw new InputError('Transcript record missing words array.', 'words')
	}
	const rawWords = wordList.map((entry: unknown, index: number) =>
		readWord(entry, index, options.defaultConfidence),
	)
	const { words, warnings } = sanitizeTranscriptWords(rawWords)
	return {
		record: {
			metadata: { artist, track, originalLyrics, startOffset },
			words,
		},
		warnings,
	}
}
