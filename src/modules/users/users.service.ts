import { Injectable } from '@nestjs/common';
import bcrypt from 'bcrypt';

import { ContentNoChangeException } from '../../common/exceptions/content-no-change.exception';
import { ResourceNotFoundException } from '../../common/exceptions/resource-not-found.exception';
import { AccessDeniedException } from '../../common/exceptions/access-denied.exception';
import { validateInput } from '../../common/validation/validate-input';
import { CrudService } from '../../common/crud/crud.service';
import type { DbSession } from '../../common/crud/crud.types';
import { UserResponseDto } from './dto/user-response.dto';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { User } from './entities/user.entity';

export const PASSWORD_HASH_ROUNDS = 10;

export interface NewUser {
  name: string;
  credentials: {
    email: string;
    hashedPassword: string;
    isActive?: boolean;
  };
}

export interface UserChanges {
  name?: string;
  credentials?: Partial<NewUser['credentials']>;
}

/*
Users Service - user accounts on top of the generic CRUD engine
*/
@Injectable()
export class UsersService extends CrudService<User, NewUser, UserChanges> {
  constructor() {
    super(User, { requires: ['credentials', 'timestamps', 'softDelete'] });
  }

  /*
  Register a new account. The email must not be taken.
  */
  async register(session: DbSession, input: CreateUserDto): Promise<User> {
    const { name, email, password } = await validateInput(
      CreateUserDto,
      input,
    );

    const hashedPassword = await bcrypt.hash(password, PASSWORD_HASH_ROUNDS);
    const user = await this.create(session, {
      name,
      credentials: { email, hashedPassword },
    });

    this.logger.log(`New user registered: ${email}`);
    return user;
  }

  async findByEmail(session: DbSession, email: string): Promise<User> {
    const normalized = email.trim().toLowerCase();
    const user = await this.findFirst(session, {
      'credentials.email': normalized,
    });

    if (!user) {
      throw new ResourceNotFoundException(this.entityName, normalized, 'email');
    }

    return user;
  }

  /*
  Partial profile update; refuses an update that would change nothing
  */
  async updateProfile(
    session: DbSession,
    id: string,
    input: UpdateUserDto,
  ): Promise<User> {
    const { name, email, password } = await validateInput(
      UpdateUserDto,
      input,
    );
    const user = await this.get(session, id);

    const changes: UserChanges = {};
    const credentials: Partial<NewUser['credentials']> = {};

    if (name !== undefined && name !== user.name) {
      changes.name = name;
    }
    if (email !== undefined && email !== user.credentials.email) {
      credentials.email = email;
    }
    if (
      password !== undefined &&
      !(await bcrypt.compare(password, user.credentials.hashedPassword))
    ) {
      credentials.hashedPassword = await bcrypt.hash(
        password,
        PASSWORD_HASH_ROUNDS,
      );
    }
    if (Object.keys(credentials).length > 0) {
      changes.credentials = credentials;
    }

    if (Object.keys(changes).length === 0) {
      throw new ContentNoChangeException();
    }

    return this.update(session, id, changes);
  }

  /*
  Change password after checking the current one
  */
  async changePassword(
    session: DbSession,
    id: string,
    currentPassword: string,
    newPassword: string,
  ): Promise<User> {
    const user = await this.get(session, id);

    if (!user.credentials.isActive || user.softDelete.isDeleted) {
      throw new AccessDeniedException('Account is inactive');
    }

    const isPasswordValid = await bcrypt.compare(
      currentPassword,
      user.credentials.hashedPassword,
    );
    if (!isPasswordValid) {
      throw new AccessDeniedException('Current password is wrong');
    }

    if (currentPassword === newPassword) {
      throw new ContentNoChangeException(
        'New password must differ from the current one',
      );
    }

    await validateInput(UpdateUserDto, { password: newPassword });
    const hashedPassword = await bcrypt.hash(newPassword, PASSWORD_HASH_ROUNDS);

    this.logger.log(`Password changed for user ${id}`);
    return this.update(session, id, { credentials: { hashedPassword } });
  }

  async deactivate(session: DbSession, id: string): Promise<User> {
    const user = await this.get(session, id);
    if (!user.credentials.isActive) {
      throw new ContentNoChangeException('User is already inactive');
    }
    return this.update(session, id, { credentials: { isActive: false } });
  }

  /*
  Restore a soft-deleted user through the trait's own restore()
  */
  async restore(session: DbSession, id: string): Promise<User> {
    const user = await this.get(session, id);
    if (!user.softDelete.isDeleted) {
      throw new ContentNoChangeException('User is not deleted');
    }

    user.softDelete.restore();
    user.timestamps.touch(new Date());
    await this.transactional(session, id, () => session.manager.save(user));

    this.logger.log(`Restored user ${id}`);
    return this.get(session, id);
  }

  toResponse(user: User): UserResponseDto {
    return UserResponseDto.fromEntity(user);
  }
}
