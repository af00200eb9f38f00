// Test setup file
process.env.NODE_ENV = 'test';

// Keep service loggers quiet unless a test run asks for them
if (!process.env.TEST_LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
delete process.env.CHUNKSHELL_DEBUG;
