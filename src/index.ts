import 'reflect-metadata';

export * from './common/exceptions';
export * from './common/entities/base.entity';
export * from './common/entities/timestamps.embedded';
export * from './common/entities/soft-delete.embedded';
export * from './common/entities/credentials.embedded';
export * from './common/entities/entity-capabilities';
export * from './common/crud/crud.types';
export * from './common/crud/crud.service';
export * from './common/config/env.validation';
export * from './common/config/database.config';
export * from './common/database/database.service';
export * from './common/database/database.module';
export * from './common/validation/validate-input';
export * from './modules/users/entities/user.entity';
export * from './modules/users/dto/create-user.dto';
export * from './modules/users/dto/update-user.dto';
export * from './modules/users/dto/user-response.dto';
export * from './modules/users/users.service';
export * from './modules/users/users.module';
export * from './app.module';
