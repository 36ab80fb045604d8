import { Command } from 'commander';
import { keygenCommand } from './commands/keygen.command.js';
import { openCommand } from './commands/open.command.js';
import { probeCommand } from './commands/probe.command.js';
import { sealCommand } from './commands/seal.command.js';
import { signCommand } from './commands/sign.command.js';
import { BANNER, dim } from './theme.js';

export function buildProgram(): Command {
	const program = new Command();

	program
		.name('hookseal')
		.description(BANNER)
		.version('0.1.0')
		.addHelpText(
			'after',
			`
${dim('Examples:')}
  $ hookseal keygen --env
  $ hookseal seal '{"msgtype":"text"}' --token T --key K
  $ hookseal probe https://example.test/callback
`,
		);

	program.addCommand(keygenCommand());
	program.addCommand(signCommand());
	program.addCommand(sealCommand());
	program.addCommand(openCommand());
	program.addCommand(probeCommand());

	return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
	await buildProgram().parseAsync(argv);
}

export { resolveCredentials, resolveToken } from './credentials.js';
export type { CredentialOptions } from './credentials.js';
