import chalk, { type ChalkInstance } from 'chalk';

// Color only for meaning; data written to stdout stays plain so it can be piped.

export const success: ChalkInstance = chalk.green;
export const danger: ChalkInstance = chalk.red;
export const dim: ChalkInstance = chalk.dim;
export const bold: ChalkInstance = chalk.bold;

export const BANNER = `${bold('hookseal')} ${dim('callback signature and envelope tool')}`;

/** Report a failure on stderr and mark the process as failed. */
export function fail(error: unknown): void {
	const msg = error instanceof Error ? error.message : String(error);
	console.error(danger(`Error: ${msg}`));
	process.exitCode = 1;
}
