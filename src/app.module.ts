// Loads .env before the entities below fix their column types
import 'dotenv/config';
import { ConfigModule } from '@nestjs/config';
import { Module } from '@nestjs/common';

import { DatabaseModule } from './common/database/database.module';
import { envValidationSchema } from './common/config/env.validation';
import { UsersModule } from './modules/users/users.module';

@Module({
  imports: [
    // Global config
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validationSchema: envValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
    }),

    // Database connection and sessions
    DatabaseModule,

    UsersModule,
  ],
})
export class AppModule {}
