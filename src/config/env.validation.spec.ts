import { validateEnv } from './env.validation';

const base = {
  DB_HOST: 'localhost',
  DB_USER: 'postgres',
  DB_PASSWORD: 'postgres',
  DB_NAME: 'tutor_log',
  JWT_ACCESS_SECRET: 'test-access-secret',
  JWT_REFRESH_SECRET: 'test-refresh-secret',
};

describe('validateEnv', () => {
  it('applies defaults for optional values', () => {
    const env = validateEnv(base);

    expect(env.PORT).toBe(3000);
    expect(env.DB_PORT).toBe(5432);
    expect(env.NODE_ENV).toBe('development');
    expect(env.SKIP_DATABASE_SETUP).toBe(false);
  });

  it('coerces numeric strings', () => {
    const env = validateEnv({ ...base, PORT: '8080', DB_PORT: '6543' });

    expect(env.PORT).toBe(8080);
    expect(env.DB_PORT).toBe(6543);
  });

  it('reads SKIP_DATABASE_SETUP case-insensitively', () => {
    expect(validateEnv({ ...base, SKIP_DATABASE_SETUP: 'TRUE' }).SKIP_DATABASE_SETUP).toBe(true);
    expect(validateEnv({ ...base, SKIP_DATABASE_SETUP: 'yes' }).SKIP_DATABASE_SETUP).toBe(false);
  });

  it('names every missing variable', () => {
    const { DB_HOST: _host, JWT_ACCESS_SECRET: _secret, ...rest } = base;

    expect(() => validateEnv(rest)).toThrow(/DB_HOST: .*; JWT_ACCESS_SECRET: /);
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() => validateEnv({ ...base, NODE_ENV: 'staging' })).toThrow(
      'Invalid environment configuration: NODE_ENV:',
    );
  });
});
