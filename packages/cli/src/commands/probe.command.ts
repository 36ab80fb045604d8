import { randomBytes } from 'node:crypto';
import { HandshakeService } from '@hookseal/core';
import { Command } from 'commander';
import ora from 'ora';
import { type CredentialOptions, resolveCredentials, withCredentialOptions } from '../credentials.js';
import { dim } from '../theme.js';

interface ProbeOptions extends CredentialOptions {
	echo?: string;
}

/** Builds the signed GET a sender issues when an endpoint is first configured. */
export function buildChallengeUrl(endpoint: string, handshake: HandshakeService, echo: string): URL {
	const sealed = handshake.sealReply(echo);
	const url = new URL(endpoint);
	url.searchParams.set('msg_signature', sealed.msgsignature);
	url.searchParams.set('timestamp', sealed.timestamp);
	url.searchParams.set('nonce', sealed.nonce);
	url.searchParams.set('echostr', sealed.encrypt);
	return url;
}

export function probeCommand(): Command {
	return withCredentialOptions(
		new Command('probe')
			.description('Send a verification challenge to a deployed callback endpoint')
			.argument('<url>', 'Callback URL, e.g. https://example.test/callback')
			.option('--echo <text>', 'Echo string to send (default: random)'),
	).action(async (endpoint: string, options: ProbeOptions) => {
		const spinner = ora({ text: 'Preparing challenge...', indent: 2 }).start();

		try {
			const handshake = new HandshakeService(resolveCredentials(options));
			const echo = options.echo ?? randomBytes(8).toString('hex');
			const url = buildChallengeUrl(endpoint, handshake, echo);

			spinner.text = `Probing ${url.origin}${url.pathname}...`;
			const response = await fetch(url, { method: 'GET' });
			const body = await response.text();

			if (!response.ok) {
				spinner.fail(`Endpoint answered ${response.status} ${dim(body.slice(0, 200))}`);
				process.exitCode = 1;
				return;
			}
			if (body !== echo) {
				spinner.fail('Endpoint answered 200 but did not echo the challenge');
				process.exitCode = 1;
				return;
			}
			spinner.succeed('Endpoint answered the challenge');
		} catch (error: unknown) {
			const msg = error instanceof Error ? error.message : 'Unknown error';
			spinner.fail(`Probe failed: ${msg}`);
			process.exitCode = 1;
		}
	});
}
