import { randomInt } from 'node:crypto';
import { generateEncodedKey } from '@hookseal/core';
import { Command } from 'commander';

const TOKEN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const TOKEN_LENGTH = 32;

export function generateToken(): string {
	let token = '';
	for (let i = 0; i < TOKEN_LENGTH; i++) {
		token += TOKEN_ALPHABET[randomInt(TOKEN_ALPHABET.length)];
	}
	return token;
}

export function keygenCommand(): Command {
	return new Command('keygen')
		.description('Generate a fresh encoding AES key')
		.option('--env', 'Print a token and key as environment assignments')
		.action((options: { env?: boolean }) => {
			const key = generateEncodedKey();
			if (!options.env) {
				console.log(key);
				return;
			}
			console.log(`CALLBACK_TOKEN=${generateToken()}`);
			console.log(`CALLBACK_ENCODING_AES_KEY=${key}`);
		});
}
