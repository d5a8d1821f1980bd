// Keep structured log lines out of test output
process.env.LOG_LEVEL = 'silent';
