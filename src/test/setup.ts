// Vitest setup: stable, unstyled output for every suite.
process.env.WFMON_BORING = '1';
delete process.env.WFMON_DEBUG;
delete process.env.UPDATE_INTERVAL;
delete process.env.ENABLE_NOTIFICATIONS;
delete process.env.WFMON_STATE_DIR;
