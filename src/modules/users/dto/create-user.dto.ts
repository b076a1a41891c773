import {
  IsEmail,
  IsString,
  MinLength,
  MaxLength,
  IsNotEmpty,
} from 'class-validator';
import { Transform } from 'class-transformer';

import { normalizeEmail } from './normalize-email';

export class CreateUserDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @Transform(normalizeEmail)
  @IsEmail({}, { message: 'Email is invalid' })
  email!: string;

  @IsString()
  @MinLength(8, { message: 'Password must have at least 8 characters' })
  @MaxLength(72)
  password!: string;
}
