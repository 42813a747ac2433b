import { test, expect } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { tmpdir } from 'node:os'
import {
	PromptCancelled,
	createSpinnerProgressReporter,
	filterPromptChoices,
	formatProgressBar,
	listTranscriptFiles,
	pickTranscriptFile,
	resolveOptionalString,
} from './cli-ux'
import type { PromptChoice, Prompter } from './cli-ux'

async function withTempDir(callback: (dir: string) => Promise<void>) {
	const dir = await mkdtemp(path.join(tmpdir(), 'lyric-align-'))
	try {
		await callback(dir)
	} finally {
		await rm(dir, { recursive: true, force: true })
	}
}

async function createTranscriptTree(dir: string) {
	await mkdir(path.join(dir, 'album'))
	await mkdir(path.join(dir, 'node_modules'))
	await writeFile(path.join(dir, 'b-song.json'), '{}')
	await writeFile(path.join(dir, 'notes.txt'), 'notes')
	await writeFile(path.join(dir, 'album', 'a-song.JSON'), '{}')
	await writeFile(path.join(dir, 'node_modules', 'package.json'), '{}')
}

function createSearchPrompter(
	pick: (choices: PromptChoice<unknown>[]) => PromptChoice<unknown> | undefined,
	manualPath = '',
): Prompter & { searched: string[][] } {
	const searched: string[][] = []
	return {
		searched,
		async select() {
			throw new Error('select not expected')
		},
		async search<T>(_message: string, choices: PromptChoice<T>[]): Promise<T> {
			searched.push(choices.map((choice) => choice.name))
			const picked = pick(choices)
			const match = choices.find((choice) => choice === picked)
			if (!match) {
				throw new Error('No choice picked')
			}
			return match.value
		},
		async input() {
			return manualPath
		},
	}
}

test('formatProgressBar fills in proportion to the value', () => {
	expect(formatProgressBar(0.5, 10)).toBe('[#####-----]')
	expect(formatProgressBar(2, 4)).toBe('[####]')
	expect(formatProgressBar(-1, 4)).toBe('[----]')
})

test('createSpinnerProgressReporter renders each update', () => {
	const rendered: string[] = []
	const reporter = createSpinnerProgressReporter('Aligning', (text) => {
		rendered.push(text)
	})
	reporter.start({ stepCount: 4, label: 'Matching lines' })
	reporter.step('Line 1/4')
	reporter.step('Line 2/4')
	reporter.finish()
	expect(rendered).toEqual([
		'Aligning | [------------] | Matching lines',
		'Aligning | [###---------] | Line 1/4',
		'Aligning | [######------] | Line 2/4',
		'Aligning | [############] | Complete',
	])
})

test('filterPromptChoices ranks matches by name and keywords', () => {
	const choices = [
		{ name: 'album/first.json', value: 1, keywords: ['first'] },
		{ name: 'second.json', value: 2, keywords: ['second'] },
	]
	expect(filterPromptChoices(choices, '  ')).toBe(choices)
	expect(filterPromptChoices(choices, 'second').map((choice) => choice.value)).toEqual([2])
})

test('resolveOptionalString trims and drops empty values', () => {
	expect(resolveOptionalString('  song.json ')).toBe('song.json')
	expect(resolveOptionalString('   ')).toBeUndefined()
	expect(resolveOptionalString(3)).toBeUndefined()
})

test('listTranscriptFiles finds matching files one level deep', async () => {
	await withTempDir(async (dir) => {
		await createTranscriptTree(dir)
		expect(await listTranscriptFiles(dir, ['.json'])).toEqual([
			path.join(dir, 'album', 'a-song.JSON'),
			path.join(dir, 'b-song.json'),
		])
	})
})

test('pickTranscriptFile returns the chosen file', async () => {
	await withTempDir(async (dir) => {
		await createTranscriptTree(dir)
		const prompter = createSearchPrompter((choices) =>
			choices.find((choice) => choice.name === 'b-song.json'),
		)
		const selected = await pickTranscriptFile(prompter, {
			message: 'Select transcript file',
			startDir: dir,
			extensions: ['.json'],
		})
		expect(selected).toBe(path.join(dir, 'b-song.json'))
		expect(prompter.searched).toEqual([
			[
				path.join('album', 'a-song.JSON'),
				'b-song.json',
				'Enter path manually',
				'Cancel',
			],
		])
	})
})

test('pickTranscriptFile accepts a manually entered path', async () => {
	await withTempDir(async (dir) => {
		const manual = path.join(dir, 'typed.json')
		const prompter = createSearchPrompter(
			(choices) => choices.find((choice) => choice.name === 'Enter path manually'),
			`  ${manual}  `,
		)
		const selected = await pickTranscriptFile(prompter, {
			message: 'Select transcript file',
			startDir: dir,
			extensions: ['.json'],
		})
		expect(selected).toBe(manual)
	})
})

test('pickTranscriptFile throws PromptCancelled on cancel', async () => {
	await withTempDir(async (dir) => {
		const prompter = createSearchPrompter((choices) =>
			choices.find((choice) => choice.name === 'Cancel'),
		)
		await expect(
			pickTranscriptFile(prompter, {
				message: 'Select transcript file',
				startDir: dir,
				extensions: ['.json'],
			}),
		).rejects.toBeInstanceOf(PromptCancelled)
	})
})
