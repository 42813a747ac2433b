#!/usr/bin/env node
import path from 'node:path'
import type { Arguments } from 'yargs'
import yargs from 'yargs/yargs'
import { hideBin } from 'yargs/helpers'
import { inspectTranscript, runAlignLyrics } from './align-lyrics'
import {
	TRANSCRIPT_EXTENSIONS,
	collectInputPaths,
	configureAlignCommand,
	configureMatchingOptions,
	normalizeAlignArgs,
	resolveConfigOverrides,
} from './align-lyrics/cli'
import { setLogHooks } from './align-lyrics/logging'
import {
	PromptCancelled,
	createInquirerPrompter,
	createSpinnerProgressReporter,
	isInteractive,
	pauseActiveSpinner,
	pickTranscriptFile,
	resumeActiveSpinner,
	type Prompter,
	withSpinner,
} from './cli-ux'

type CliUxContext = {
	interactive: boolean
	prompter?: Prompter
}

async function main(rawArgs = hideBin(process.argv)) {
	const context = createCliUxContext()
	let args = rawArgs

	if (context.interactive && args.length === 0 && context.prompter) {
		const selection = await promptForCommand(context.prompter)
		if (!selection) {
			return
		}
		args = selection
	}

	const parser = yargs(args)
		.scriptName('lyric-align')
		.command(
			'align [input...]',
			'Align transcripts against their lyrics and write LRC files',
			configureAlignCommand,
			async (argv) => {
				const alignArgs = normalizeAlignArgs(
					await resolveInputArgs(argv, context),
				)
				await withSpinner(
					'Aligning lyrics',
					async () => {
						setLogHooks({
							beforeLog: pauseActiveSpinner,
							afterLog: resumeActiveSpinner,
						})
						try {
							await runAlignLyrics(
								alignArgs,
								context.interactive
									? createSpinnerProgressReporter('Aligning lyrics')
									: undefined,
							)
						} finally {
							setLogHooks({})
						}
					},
					{ successText: 'Alignment complete', enabled: context.interactive },
				)
			},
		)
		.command(
			'inspect [input]',
			'Print the per-line match report for a transcript as JSON',
			(command) =>
				configureMatchingOptions(
					command.positional('input', {
						type: 'string',
						describe: 'Transcript record JSON file',
					}),
				),
			async (argv) => {
				const resolved = await resolveInputArgs(argv, context)
				const inputPath = collectInputPaths(resolved.input)[0]
				if (!inputPath) {
					throw new Error('A transcript file is required.')
				}
				const config = resolveConfigOverrides(argv)
				const report = await withSpinner(
					'Matching lines',
					() => inspectTranscript(path.resolve(inputPath), config),
					{ successText: 'Matching complete', enabled: context.interactive },
				)
				process.stdout.write(report)
			},
		)
		.demandCommand(1)
		.strict()
		.help()

	await parser.parseAsync()
}

function createCliUxContext(): CliUxContext {
	const interactive = isInteractive()
	if (!interactive) {
		return { interactive }
	}
	return { interactive, prompter: createInquirerPrompter() }
}

async function promptForCommand(
	prompter: Prompter,
): Promise<string[] | null> {
	const selection = await prompter.select('Choose a command', [
		{
			name: 'Align transcripts against their lyrics and write LRC files',
			value: 'align',
		},
		{ name: 'Print the per-line match report', value: 'inspect' },
		{ name: 'Show help', value: 'help' },
		{ name: 'Exit', value: 'exit' },
	])
	switch (selection) {
		case 'exit':
			return null
		case 'help':
			return ['--help']
		default:
			return [selection]
	}
}

async function resolveInputArgs(
	argv: Arguments,
	context: CliUxContext,
): Promise<Arguments> {
	if (collectInputPaths(argv.input).length > 0) {
		return argv
	}
	if (!context.interactive || !context.prompter) {
		throw new Error('At least one transcript file is required.')
	}
	const inputPath = await pickTranscriptFile(context.prompter, {
		message: 'Select transcript file',
		extensions: TRANSCRIPT_EXTENSIONS,
	})
	return { ...argv, input: [inputPath] }
}

main().catch((error) => {
	if (error instanceof PromptCancelled) {
		console.log('[info] Cancelled.')
		return
	}
	console.error(
		`[error] ${error instanceof Error ? error.message : String(error)}`,
	)
	process.exit(1)
})
