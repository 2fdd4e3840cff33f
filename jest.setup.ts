// Keep test output quiet unless a run opts in with LOG_LEVEL.
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}
