#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListCommand, ListLoader } from '@adonisjs/ace'
import GenerateAstCommand from './commands/generate-ast.ts'
import ScanCommand from './commands/scan.ts'
import { resolveCommandArgv } from './utils.ts'

const version = '0.1.0'

const commands = [ScanCommand, GenerateAstCommand, HelpCommand, ListCommand]

const kernel = Kernel.create()

kernel.info.set('binary', 'loxlex')
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

kernel.on('help', async (command, $kernel, parsed) => {
	// bare `--help` falls through to the default command, which lists everything
	if (command.commandName === ListCommand.commandName) return false
	parsed.args.unshift(command.commandName)
	const help = new HelpCommand($kernel, parsed, $kernel.ui, $kernel.prompt)
	await help.exec()
	return true
})

kernel.on('version', async () => {
	console.log(`loxlex v${version}`)
	return true
})

kernel.addLoader(new ListLoader(commands))

const argv = resolveCommandArgv(
	process.argv.slice(2),
	commands.map((command) => command.commandName)
)

try {
	await kernel.handle(argv)
	if (kernel.exitCode !== undefined) {
		process.exitCode = kernel.exitCode
	}
} catch (error: unknown) {
	console.error(error)
	process.exit(1)
}
