import path from 'node:path'
import { mkdir, writeFile } from 'node:fs/promises'
import type { DataQualityWarning } from './types'

type LogHook = () => void

let beforeLogHook: LogHook | null = null
let afterLogHook: LogHook | null = null

export function setLogHooks(hooks: {
	beforeLog?: LogHook
	afterLog?: LogHook
}) {
	beforeLogHook = hooks.beforeLog ?? null
	afterLogHook = hooks.afterLog ?? null
}

function withLogHooks(callback: () => void) {
	beforeLogHook?.()
	try {
		callback()
	} finally {
		afterLogHook?.()
	}
}

export function logInfo(message: string) {
	withLogHooks(() => {
		console.log(`[info] ${message}`)
	})
}

export function logWarn(message: string) {
	withLogHooks(() => {
		console.warn(`[warn] ${message}`)
	})
}

export function logDataQuality(source: string, warnings: DataQualityWarning[]) {
	for (const warning of warnings) {
		logWarn(`${source}: [${warning.kind}] ${warning.message}`)
	}
}

export async function writeLogFile(logPath: string, lines: string[]) {
	await mkdir(path.dirname(logPath), { recursive: true })
	await writeFile(logPath, `${lines.join('\n')}\n`)
}
