import path from 'node:path'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import type { AlignCliArgs } from './align-lyrics/cli'
import type { AlignConfig } from './align-lyrics/config'
import { InputError } from './align-lyrics/errors'
import { renderLrc } from './align-lyrics/lrc-output'
import { logDataQuality, logInfo, logWarn } from './align-lyrics/logging'
import { buildLrcOutputPath, buildReportPath } from './align-lyrics/paths'
import { alignLyrics, type AlignmentResult } from './align-lyrics/pipeline'
import {
	writeSummaryLog,
	type AlignmentSummaryEntry,
} from './align-lyrics/summary'
import type { StepProgressReporter } from './progress-reporter'
import { formatSeconds } from './utils'

export async function readTranscriptFile(inputPath: string): Promise<unknown> {
	let raw: string
	try {
		raw = await readFile(inputPath, 'utf8')
	} catch (error) {
		throw new InputError(
			`Transcript file not readable: ${inputPath} (${error instanceof Error ? error.message : String(error)})`,
			'file',
		)
	}
	try {
		return JSON.parse(raw)
	} catch (error) {
		throw new InputError(
			`Transcript JSON parse error in ${inputPath}: ${error instanceof Error ? error.message : String(error)}`,
			'file',
		)
	}
}

export function buildAlignmentReportJson(result: AlignmentResult) {
	const payload = {
		metadata: result.track.metadata,
		duration: result.track.duration,
		startOffset: result.startOffset,
		report: result.report,
		breaks: result.track.breaks,
		lines: result.track.lines.map((line) => {
			const match = result.results[line.index]
			return {
				index: line.index,
				text: result.lyrics[line.index]?.text ?? '',
				provenance: line.provenance,
				score: line.score,
				bestScore:
					match?.kind === 'unmatched' ? match.bestScore : (match?.score ?? null),
				transcriptWindow:
					match?.kind === 'matched'
						? match.window.words.map((word) => word.text).join(' ')
						: null,
				words: line.words,
			}
		}),
	}
	return `${JSON.stringify(payload, null, 2)}\n`
}

export async function inspectTranscript(
	inputPath: string,
	config: AlignConfig,
	reporter?: StepProgressReporter,
) {
	const payload = await readTranscriptFile(inputPath)
	return buildAlignmentReportJson(alignLyrics(payload, { config, reporter }))
}

async function alignOne(
	inputPath: string,
	args: AlignCliArgs,
	reporter?: StepProgressReporter,
): Promise<AlignmentSummaryEntry> {
	const payload = await readTranscriptFile(inputPath)
	const result = alignLyrics(payload, { config: args.config, reporter })
	const { track, report } = result
	const outputPath = buildLrcOutputPath({
		inputPath,
		outputDir: args.outputDir,
		artist: track.metadata.artist,
		track: track.metadata.track,
	})
	const lrc = renderLrc(track, {
		showBreaks: args.showBreaks,
		lyricsLines: result.lyrics,
	})

	const total = report.matchedLines + report.interpolatedLines
	logInfo(
		`${track.metadata.artist} - ${track.metadata.track}: matched ${report.matchedLines}/${total} lines, ${report.breakCount} instrumental break(s), ${formatSeconds(track.duration)}.`,
	)
	logDataQuality(path.basename(inputPath), report.warnings)
	if (report.degraded) {
		logWarn(
			`${path.basename(inputPath)}: output is fully interpolated (${report.interpolatedLines} lines).`,
		)
	}

	if (args.dryRun) {
		logInfo(`[dry-run] Would write ${outputPath}`)
	} else {
		await mkdir(path.dirname(outputPath), { recursive: true })
		await writeFile(outputPath, lrc)
		logInfo(`LRC written to ${outputPath}`)
		if (args.writeReport) {
			const reportPath = buildReportPath(outputPath)
			await writeFile(reportPath, buildAlignmentReportJson(result))
			logInfo(`Report written to ${reportPath}`)
		}
	}

	return {
		inputPath,
		outputPath: args.dryRun ? null : outputPath,
		duration: track.duration,
		report,
	}
}

/**
 * Align every input in order. Input errors fail only their own file; any
 * other error aborts the batch.
 */
export async function runAlignLyrics(
	args: AlignCliArgs,
	reporter?: StepProgressReporter,
): Promise<AlignmentSummaryEntry[]> {
	if (args.dryRun) {
		logInfo('Dry run enabled; no files will be written.')
	}
	const entries: AlignmentSummaryEntry[] = []
	for (const inputPath of args.inputPaths) {
		try {
			entries.push(await alignOne(inputPath, args, reporter))
		} catch (error) {
			if (!(error instanceof InputError) || args.inputPaths.length === 1) {
				throw error
			}
			logWarn(`Skipping ${inputPath}: ${error.message}`)
			entries.push({
				inputPath,
				outputPath: null,
				duration: 0,
				report: null,
				error: error.message,
			})
		}
	}

	if (args.writeLogs) {
		const firstInput = args.inputPaths[0]
		const summaryDir =
			args.outputDir ?? (firstInput ? path.dirname(firstInput) : process.cwd())
		await writeSummaryLog({
			outputDir: summaryDir,
			entries,
			dryRun: args.dryRun,
		})
	}
	return entries
}
