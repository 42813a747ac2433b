import path from 'node:path'
import { readdir, stat } from 'node:fs/promises'
import searchPrompt from '@inquirer/search'
import { matchSorter } from 'match-sorter'
import inquirer from 'inquirer'
import ora, { type Ora } from 'ora'
import type { StepProgressReporter } from './progress-reporter'

export type PromptChoice<T> = {
	name: string
	value: T
	description?: string
	keywords?: string[]
}

export type Prompter = {
	select<T>(message: string, choices: PromptChoice<T>[]): Promise<T>
	search<T>(message: string, choices: PromptChoice<T>[]): Promise<T>
	input(
		message: string,
		options?: {
			defaultValue?: string
			validate?: (value: string) => true | string | Promise<true | string>
		},
	): Promise<string>
}

export class PromptCancelled extends Error {
	constructor(message = 'Prompt cancelled.') {
		super(message)
		this.name = 'PromptCancelled'
	}
}

function isExitPromptError(error: unknown) {
	if (error instanceof Error) {
		return (
			error.name === 'ExitPromptError' ||
			error.message.includes('User force closed the prompt')
		)
	}
	return false
}

async function runPrompt<T>(action: () => Promise<T>): Promise<T> {
	try {
		return await action()
	} catch (error) {
		if (isExitPromptError(error)) {
			throw new PromptCancelled()
		}
		throw error
	}
}

export function resolveOptionalString(value: unknown) {
	if (typeof value !== 'string') {
		return undefined
	}
	const trimmed = value.trim()
	return trimmed.length > 0 ? trimmed : undefined
}

export function isInteractive() {
	if (process.env.LYRIC_ALIGN_FORCE_INTERACTIVE === '1') {
		return true
	}
	if (process.env.CI) {
		return false
	}
	return Boolean(process.stdin.isTTY && process.stdout.isTTY)
}

let activeSpinner: Ora | null = null

export function pauseActiveSpinner() {
	if (activeSpinner?.isSpinning) {
		activeSpinner.stop()
	}
}

export function resumeActiveSpinner() {
	if (activeSpinner && !activeSpinner.isSpinning) {
		activeSpinner.start()
	}
}

function setActiveSpinnerText(text: string) {
	if (activeSpinner) {
		activeSpinner.text = text
	}
}

const PROGRESS_BAR_WIDTH = 12

export function formatProgressBar(value: number, width = PROGRESS_BAR_WIDTH) {
	const clamped = Math.max(0, Math.min(1, value))
	const filled = Math.round(clamped * width)
	return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`
}

/**
 * Progress reporter that renders into the active spinner text, e.g.
 * "Aligning | [######------] | Line 6/12".
 */
export function createSpinnerProgressReporter(
	action: string,
	render: (text: string) => void = setActiveSpinnerText,
): StepProgressReporter {
	let stepIndex = 0
	let stepCount = 1
	let label = 'Starting'
	const update = () => {
		render(`${action} | ${formatProgressBar(stepIndex / stepCount)} | ${label}`)
	}
	return {
		start(options) {
			stepCount = Math.max(1, Math.round(options.stepCount))
			stepIndex = 0
			label = options.label ?? 'Starting'
			update()
		},
		step(nextLabel) {
			stepIndex = Math.min(stepIndex + 1, stepCount)
			label = nextLabel
			update()
		},
		finish(nextLabel) {
			stepIndex = stepCount
			label = nextLabel ?? 'Complete'
			update()
		},
	}
}

export async function withSpinner<T>(
	text: string,
	action: () => Promise<T>,
	options?: {
		successText?: string
		failText?: string
		enabled?: boolean
	},
): Promise<T> {
	const enabled = options?.enabled ?? isInteractive()
	if (!enabled) {
		return action()
	}
	const spinner = ora({ text }).start()
	activeSpinner = spinner
	try {
		const result = await action()
		spinner.succeed(options?.successText ?? `${text} done`)
		return result
	} catch (error) {
		spinner.fail(options?.failText ?? `${text} failed`)
		throw error
	} finally {
		if (activeSpinner === spinner) {
			activeSpinner = null
		}
	}
}

export function filterPromptChoices<T>(
	choices: PromptChoice<T>[],
	input?: string,
) {
	const query = input?.trim() ?? ''
	if (query.length === 0) {
		return choices
	}
	return matchSorter(choices, query, {
		keys: [
			(choice) =>
				[choice.name, choice.description, ...(choice.keywords ?? [])]
					.filter(Boolean)
					.join(' '),
		],
	})
}

export function createInquirerPrompter(): Prompter {
	return {
		async select<T>(message: string, choices: PromptChoice<T>[]) {
			return runPrompt(async () => {
				const { result } = await inquirer.prompt<{ result: T }>([
					{ type: 'list', name: 'result', message, choices },
				])
				return result
			})
		},
		async search<T>(message: string, choices: PromptChoice<T>[]) {
			return runPrompt(() =>
				searchPrompt<T>({
					message,
					source: async (input) => filterPromptChoices(choices, input),
				}),
			)
		},
		async input(message, options) {
			return runPrompt(async () => {
				const { result } = await inquirer.prompt<{ result: string }>([
					{
						type: 'input',
						name: 'result',
						message,
						default: options?.defaultValue,
						validate: options?.validate,
					},
				])
				return result
			})
		},
	}
}

type TranscriptChoice =
	| { kind: 'file'; path: string }
	| { kind: 'manual' }
	| { kind: 'cancel' }

const IGNORED_DIRS = new Set(['node_modules', '.git', '.cache', 'dist'])

/**
 * Files with one of the extensions in `directory` and its immediate
 * subdirectories, sorted by relative path.
 */
export async function listTranscriptFiles(
	directory: string,
	extensions: string[],
): Promise<string[]> {
	const matches = (name: string) =>
		extensions.some((extension) =>
			name.toLowerCase().endsWith(extension.toLowerCase()),
		)
	const found: string[] = []
	const entries = await readdir(directory, { withFileTypes: true })
	for (const entry of entries) {
		const entryPath = path.join(directory, entry.name)
		if (entry.isFile() && matches(entry.name)) {
			found.push(entryPath)
			continue
		}
		if (!entry.isDirectory() || IGNORED_DIRS.has(entry.name)) {
			continue
		}
		const nested = await readdir(entryPath, { withFileTypes: true })
		for (const child of nested) {
			if (child.isFile() && matches(child.name)) {
				found.push(path.join(entryPath, child.name))
			}
		}
	}
	return found.sort((a, b) =>
		path.relative(directory, a).localeCompare(path.relative(directory, b)),
	)
}

async function validateExistingFile(value: string) {
	const trimmed = resolveOptionalString(value)
	if (!trimmed) {
		return 'Enter a path.'
	}
	try {
		const stats = await stat(path.resolve(trimmed))
		return stats.isFile() ? true : 'Select a file path.'
	} catch {
		return `Path not found: ${path.resolve(trimmed)}`
	}
}

/**
 * Let the user search the transcript files under `startDir`, or type a path.
 */
export async function pickTranscriptFile(
	prompter: Prompter,
	options: { message: string; startDir?: string; extensions: string[] },
): Promise<string> {
	const startDir = options.startDir ?? process.cwd()
	const files = await listTranscriptFiles(startDir, options.extensions)
	const choices: PromptChoice<TranscriptChoice>[] = [
		...files.map((filePath) => ({
			name: path.relative(startDir, filePath),
			value: { kind: 'file' as const, path: filePath },
			keywords: [path.basename(filePath, path.extname(filePath))],
		})),
		{ name: 'Enter path manually', value: { kind: 'manual' } },
		{ name: 'Cancel', value: { kind: 'cancel' } },
	]
	const selection = await prompter.search(options.message, choices)
	switch (selection.kind) {
		case 'file':
			return selection.path
		case 'manual': {
			const manual = await prompter.input('Transcript path', {
				validate: validateExistingFile,
			})
			return path.resolve(manual.trim())
		}
		case 'cancel':
			throw new PromptCancelled()
	}
}
