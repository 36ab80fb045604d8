import type { CredentialSet } from '@hookseal/core';
import { Controller, Get, Inject } from '@nestjs/common';
import { CREDENTIAL_SET } from './common/config.js';

export interface HealthStatus {
	readonly status: 'ok';
	readonly uptime: number;
	readonly receiverIdEnforced: boolean;
	readonly timestamp: string;
}

@Controller('health')
export class HealthController {
	constructor(@Inject(CREDENTIAL_SET) private readonly credentials: CredentialSet) {}

	@Get()
	check(): HealthStatus {
		return {
			status: 'ok',
			uptime: Math.floor(process.uptime()),
			receiverIdEnforced: this.credentials.expectedReceiverId !== undefined,
			timestamp: new Date().toISOString(),
		};
	}
}
