import type { InstrumentalBreak, TimedLine, TimingTrack } from './types'

export type LrcOptions = {
	showBreaks?: boolean
	lyricsLines?: readonly { index: number; stanzaBreakBefore: boolean }[]
}

/**
 * Format seconds as mm:ss.hh, rounded to hundredths.
 */
export function formatTimestamp(seconds: number): string {
	const hundredths = Math.max(0, Math.round(seconds * 100))
	const minutes = Math.floor(hundredths / 6000)
	const remainder = hundredths % 6000
	const wholeSeconds = Math.floor(remainder / 100)
	const fraction = remainder % 100
	return `${String(minutes).padStart(2, '0')}:${String(wholeSeconds).padStart(2, '0')}.${String(fraction).padStart(2, '0')}`
}

export function formatLrcLine(line: TimedLine): string {
	const lineStart = line.words[0]?.start ?? 0
	const words = line.words
		.map((word) => `<${formatTimestamp(word.start)}>${word.text}`)
		.join(' ')
	return `[${formatTimestamp(lineStart)}]${words}`
}

export function formatBreakLine(instrumental: InstrumentalBreak): string {
	const duration = instrumental.end - instrumental.start
	return `[${formatTimestamp(instrumental.start)}]♪ INSTRUMENTAL (${formatTimestamp(duration)}) ♪`
}

// header tags hold a single line
function formatTagValue(value: string) {
	return value.replace(/\s+/g, ' ').trim()
}

/**
 * Render a track as enhanced LRC: header, then one line per lyrics line with
 * per-word timestamps.
 */
export function renderLrc(track: TimingTrack, options: LrcOptions = {}): string {
	const stanzaBreaks = new Set(
		(options.lyricsLines ?? [])
			.filter((line) => line.stanzaBreakBefore)
			.map((line) => line.index),
	)
	const breaksByLine = new Map<number | null, InstrumentalBreak[]>()
	if (options.showBreaks) {
		for (const instrumental of track.breaks) {
			const list = breaksByLine.get(instrumental.afterLine) ?? []
			list.push(instrumental)
			breaksByLine.set(instrumental.afterLine, list)
		}
	}

	const output = [
		`[ar:${formatTagValue(track.metadata.artist)}]`,
		`[ti:${formatTagValue(track.metadata.track)}]`,
		`[length:${formatTimestamp(track.duration)}]`,
	]
	const pushBreaks = (afterLine: number | null) => {
		for (const instrumental of breaksByLine.get(afterLine) ?? []) {
			if (output.at(-1) !== '') {
				output.push('')
			}
			output.push(formatBreakLine(instrumental), '')
		}
	}

	pushBreaks(null)
	for (const line of track.lines) {
		if (stanzaBreaks.has(line.index) && output.at(-1) !== '') {
			output.push('')
		}
		output.push(formatLrcLine(line))
		pushBreaks(line.index)
	}
	while (output.at(-1) === '') {
		output.pop()
	}
	return `${output.join('\n')}\n`
}
