/**
 * Runs before every test file.
 *
 * The logger reads LOG_LEVEL at import time, so keep test output quiet here.
 * buildTestApp() builds its config object directly; these values only cover
 * code paths that call buildConfig().
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.DATABASE_URL = process.env.DATABASE_URL ?? 'postgres://localhost:5432/emailmind_test';
process.env.REDIS_URL = process.env.REDIS_URL ?? 'redis://localhost:6379';
process.env.SECRET_KEY = process.env.SECRET_KEY ?? 'test-secret';
process.env.ENCRYPTION_KEY_BASE64 =
  process.env.ENCRYPTION_KEY_BASE64 ?? Buffer.alloc(32, 7).toString('base64');
