import { User } from '../entities/user.entity';

/* 
Safe to expose: no password hash, no soft delete bookkeeping
*/
export class UserResponseDto {
  id!: string;
  name!: string;
  email!: string;
  isActive!: boolean;
  createdAt!: Date;
  updatedAt!: Date;

  static fromEntity(user: User): UserResponseDto {
    const dto = new UserResponseDto();
    dto.id = user.id;
    dto.name = user.name;
    dto.email = user.credentials.email;
    dto.isActive = user.credentials.isActive;
    dto.createdAt = user.timestamps.createdAt;
    dto.updatedAt = user.timestamps.updatedAt;
    return dto;
  }
}
