// Preloaded before every test file.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_TO_CONSOLE = 'false';
