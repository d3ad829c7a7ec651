/**
 * Jest environment setup. Runs before each test file loads any module, so
 * the config module sees these values.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.LOG_FILE;
