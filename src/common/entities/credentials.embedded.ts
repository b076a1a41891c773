import { IsBoolean, IsEmail, IsNotEmpty, IsString } from 'class-validator';
import { Column } from 'typeorm';

/* 
User credentials trait - embed as `credentials` with `prefix: false`.
Hashing the password is left to the caller.
*/
export class Credentials {
  @IsEmail({}, { message: 'email must be a valid email address' })
  @Column({ name: 'email', type: 'varchar', length: 255, unique: true })
  email!: string;

  @IsString()
  @IsNotEmpty()
  @Column({ name: 'hashed_password', type: 'varchar', length: 255 })
  hashedPassword!: string;

  @IsBoolean()
  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive: boolean = true;
}

export interface HasCredentials {
  credentials: Credentials;
}
