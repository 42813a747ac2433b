import path from 'node:path'
import { formatPercent, formatSeconds } from '../utils'
import { buildSummaryLogPath } from './paths'
import { logInfo, writeLogFile } from './logging'
import type { AlignmentReport } from './types'

export type AlignmentSummaryEntry = {
	inputPath: string
	outputPath: string | null
	duration: number
	report: AlignmentReport | null
	error?: string
}

export function buildSummaryLines(entries: AlignmentSummaryEntry[]): string[] {
	const aligned = entries.filter((entry) => entry.report !== null)
	const degraded = aligned.filter((entry) => entry.report?.degraded)
	const lines = [
		`Transcripts: ${entries.length}`,
		`Aligned: ${aligned.length}`,
		`Failed: ${entries.length - aligned.length}`,
		`Degraded: ${degraded.length}`,
	]
	for (const entry of entries) {
		lines.push(`- ${path.basename(entry.inputPath)}`)
		if (!entry.report) {
			lines.push(`  Error: ${entry.error ?? 'unknown'}`)
			continue
		}
		const { report } = entry
		const total = report.matchedLines + report.interpolatedLines
		lines.push(
			`  Output: ${entry.outputPath ? path.basename(entry.outputPath) : 'none'}`,
		)
		lines.push(
			`  Matched lines: ${report.matchedLines}/${total} (${formatPercent(report.matchedLines, total)})`,
		)
		lines.push(`  Interpolated lines: ${report.interpolatedLines}`)
		lines.push(`  Instrumental breaks: ${report.breakCount}`)
		lines.push(`  Duration: ${formatSeconds(entry.duration)}`)
		if (report.warnings.length > 0) {
			lines.push(`  Warnings: ${report.warnings.length}`)
			for (const warning of report.warnings) {
				lines.push(`    [${warning.kind}] ${warning.message}`)
			}
		}
	}
	return lines
}

export async function writeSummaryLog(options: {
	outputDir: string
	entries: AlignmentSummaryEntry[]
	dryRun: boolean
}) {
	const summaryPath = buildSummaryLogPath(options.outputDir)
	if (options.dryRun) {
		logInfo(`[dry-run] Would write summary log: ${summaryPath}`)
		return null
	}
	await writeLogFile(summaryPath, buildSummaryLines(options.entries))
	logInfo(`Summary written to ${summaryPath}`)
	return summaryPath
}
