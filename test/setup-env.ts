// Loaded by vitest before every test file (see vitest.config.ts).
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.PASSWORD_PEPPER = process.env.PASSWORD_PEPPER ?? 'test-pepper-not-secret';
