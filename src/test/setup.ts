// Global test setup: plain output, no debug noise.
process.env.RELCHECK_BORING = '1';
delete process.env.RELCHECK_DEBUG;
