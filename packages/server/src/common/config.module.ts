import { type CredentialSet, isCallbackError } from '@hookseal/core';
import { Global, Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig, CREDENTIAL_SET, createCredentialSet, parseConfig } from './config.js';

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

@Global()
@Module({
	providers: [
		{
			provide: APP_CONFIG,
			useFactory: (): AppConfig => {
				try {
					return parseConfig(process.env);
				} catch (error) {
					throw new Error(`Invalid environment configuration: ${describeError(error)}`);
				}
			},
		},
		{
			provide: CREDENTIAL_SET,
			inject: [APP_CONFIG],
			useFactory: (config: AppConfig): CredentialSet => {
				try {
					return createCredentialSet(config);
				} catch (error) {
					if (!isCallbackError(error)) throw error;
					throw new Error(`Invalid callback credentials: ${error.message}`);
				}
			},
		},
	],
	exports: [APP_CONFIG, CREDENTIAL_SET],
})
export class ConfigModule {}
