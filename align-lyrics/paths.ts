import path from 'node:path'
import { sanitizeFileNamePart } from '../utils'

export function buildLrcFileName(artist: string, track: string) {
	const safeArtist = sanitizeFileNamePart(artist) || 'Unknown Artist'
	const safeTrack = sanitizeFileNamePart(track) || 'Untitled'
	return `${safeArtist} - ${safeTrack}.lrc`
}

export function buildLrcOutputPath(options: {
	inputPath: string
	outputDir: string | null
	artist: string
	track: string
}) {
	const directory = options.outputDir ?? path.dirname(options.inputPath)
	return path.join(directory, buildLrcFileName(options.artist, options.track))
}

export function buildReportPath(lrcPath: string) {
	const parsed = path.parse(lrcPath)
	return path.join(parsed.dir, `${parsed.name}.alignment.json`)
}

export function buildSummaryLogPath(outputDir: string) {
	return path.join(outputDir, 'alignment-summary.log')
}
