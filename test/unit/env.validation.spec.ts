import { envValidationSchema } from '../../src/common/config/env.validation';

describe('envValidationSchema', () => {
  it('should fill in defaults for an empty environment', () => {
    const { error, value } = envValidationSchema.validate({});

    expect(error).toBeUndefined();
    expect(value).toEqual({
      ENVIRONMENT: 'development',
      DB_TYPE: 'sqlite',
      DB_NAME: 'app.db',
      DB_USER: 'user',
      DB_PASSWORD: 'changeme',
      DB_HOST: 'localhost',
      DB_PORT: 5432,
      DB_SYNC: false,
      DB_POOL_SIZE: 83,
      WEB_CONCURRENCY: 9,
      DB_MAX_OVERFLOW: 64,
      DB_POOL_TIMEOUT: 30000,
    });
  });

  it('should convert string values from the environment', () => {
    const { error, value } = envValidationSchema.validate({
      DB_PORT: '6543',
      DB_SYNC: 'true',
      WEB_CONCURRENCY: '4',
    });

    expect(error).toBeUndefined();
    expect(value.DB_PORT).toBe(6543);
    expect(value.DB_SYNC).toBe(true);
    expect(value.WEB_CONCURRENCY).toBe(4);
  });

  it('should reject an unknown backend', () => {
    const { error } = envValidationSchema.validate({ DB_TYPE: 'mysql' });

    expect(error?.message).toBe('"DB_TYPE" must be one of [sqlite, postgres]');
  });

  it('should accept sqlite and postgres URLs only', () => {
    expect(
      envValidationSchema.validate({ DATABASE_URL: 'sqlite://:memory:' }).error,
    ).toBeUndefined();
    expect(
      envValidationSchema.validate({
        DATABASE_URL: 'postgresql://user:changeme@db/app',
      }).error,
    ).toBeUndefined();
    expect(
      envValidationSchema.validate({ DATABASE_URL: 'mysql://db/app' }).error,
    ).toBeDefined();
  });

  it('should report every problem at once', () => {
    const { error } = envValidationSchema.validate(
      { DB_TYPE: 'mysql', WEB_CONCURRENCY: 0 },
      { abortEarly: false },
    );

    expect(error?.details.map((detail) => detail.path[0])).toEqual([
      'DB_TYPE',
      'WEB_CONCURRENCY',
    ]);
  });
});
