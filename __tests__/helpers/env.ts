// runs before each test file, ahead of config.ts reading the environment
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.ADMIN_PASSWORD = 'test-admin-password';
process.env.WEEKLY_OFF_DAYS = '0';
process.env.DEFAULT_FULL_DAY_MINUTES = '171';
process.env.DEFAULT_HALF_DAY_MINUTES = '121';
process.env.CALL_LOG_DATE_ORDER = 'DMY';
delete process.env.LOG_LEVEL;
