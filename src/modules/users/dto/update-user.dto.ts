import {
  IsOptional,
  IsString,
  IsEmail,
  MaxLength,
  MinLength,
  IsNotEmpty,
} from 'class-validator';
import { Transform } from 'class-transformer';

import { normalizeEmail } from './normalize-email';

// Partial update: only the fields that are present get applied
export class UpdateUserDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name?: string;

  @IsOptional()
  @Transform(normalizeEmail)
  @IsEmail({}, { message: 'Email is invalid' })
  email?: string;

  @IsOptional()
  @IsString()
  @MinLength(8, { message: 'Password must have at least 8 characters' })
  @MaxLength(72)
  password?: string;
}
