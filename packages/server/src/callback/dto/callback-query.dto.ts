import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

/** Signature parameters shared by both callback request kinds. */
export class EventQueryDto {
	@IsOptional()
	@IsString()
	@MaxLength(128)
	msg_signature?: string;

	// Some senders use the shorter name.
	@IsOptional()
	@IsString()
	@MaxLength(128)
	signature?: string;

	@IsString()
	@IsNotEmpty()
	@MaxLength(32)
	timestamp!: string;

	@IsString()
	@IsNotEmpty()
	@MaxLength(128)
	nonce!: string;
}

export class ChallengeQueryDto extends EventQueryDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(4096)
	echostr!: string; // base64
}
