import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ResetRateLimitDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  scope!: string;

  /** Usually the client IP address */
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  clientKey!: string;
}
