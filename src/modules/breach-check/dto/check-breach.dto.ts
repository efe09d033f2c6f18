import { Transform } from 'class-transformer';
import { IsEmail, IsInt, IsOptional, IsString } from 'class-validator';

export class CheckBreachDto {
  /** SHA-1 digest of the identifier, hex encoded. */
  @IsString()
  hash!: string;

  @IsOptional()
  @Transform(({ value }) => (value === '' ? undefined : value))
  @IsEmail()
  email?: string;

  @IsOptional()
  @IsInt()
  telegram_chat_id?: number;

  /** Accepted for client compatibility; not used by the check. */
  @IsOptional()
  @IsString()
  last4?: string;
}
