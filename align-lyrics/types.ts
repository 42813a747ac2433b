export type TranscriptWord = {
	readonly index: number
	readonly text: string
	readonly originalText: string | null
	readonly start: number
	readonly end: number
	readonly confidence: number
}

export type TrackMetadata = {
	artist: string
	track: string
}

export type TranscriptRecord = {
	metadata: TrackMetadata & {
		originalLyrics: string
		startOffset: number
	}
	words: TranscriptWord[]
}

export type LyricsLine = {
	readonly index: number
	readonly words: readonly string[]
	readonly text: string
	readonly sourceLine: number
	readonly stanzaBreakBefore: boolean
}

export type TranscriptCursor = {
	readonly position: number
}

export type MatchWindow = {
	start: number
	words: readonly TranscriptWord[]
}

export type TimedWord = {
	text: string
	start: number
	end: number
}

export type MatchedLine = {
	kind: 'matched'
	lineIndex: number
	score: number
	window: MatchWindow
	words: TimedWord[]
}

export type UnmatchedLine = {
	kind: 'unmatched'
	lineIndex: number
	bestScore: number
}

export type MatchResult = MatchedLine | UnmatchedLine

export type Anchor = {
	lineIndex: number
	start: number
	end: number
}

export type LineProvenance = 'matched' | 'interpolated' | 'break-adjacent'

export type TimedLine = {
	index: number
	words: TimedWord[]
	provenance: LineProvenance
	score: number | null
}

export type InstrumentalBreak = {
	start: number
	end: number
	// last line before the break, null when the break opens the track
	afterLine: number | null
}

export type TimingTrack = {
	metadata: TrackMetadata
	lines: TimedLine[]
	breaks: InstrumentalBreak[]
	duration: number
}

export type DataQualityWarningKind =
	| 'no-transcript-words'
	| 'all-lines-unmatched'
	| 'invalid-timestamp'
	| 'overlapping-timestamp'
	| 'inverted-timestamp'

export type DataQualityWarning = {
	kind: DataQualityWarningKind
	message: string
	wordIndex?: number
}

export type AlignmentReport = {
	matchedLines: number
	interpolatedLines: number
	breakCount: number
	degraded: boolean
	warnings: DataQualityWarning[]
}
