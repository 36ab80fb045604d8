import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class EventBodyDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(1_000_000)
	encrypt!: string; // base64
}
