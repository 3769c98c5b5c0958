#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CompileCommand from './commands/compile.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'faultline')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([CompileCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(`Faultline v${version}`)
		console.log('')
		console.log('Usage: faultline [command] [options]')
		console.log('')
		console.log('Run "faultline --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))

	if (kernel.exitCode !== undefined) {
		process.exitCode = kernel.exitCode
	}
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
