/* src/cli/index.ts
 * Root CLI factory. Side-effect free: tests build and parse their own copy.
 */
import { Command } from 'commander';

import { applyCliSafety } from './cli-utils';
import { registerControl } from './control/register';
import { registerMonitors } from './monitor/register';
import { readPackageInfo } from './version';

/**
 * Build the root `wfmon` command with the engine monitors, `status` and
 * `stop`, plus the global `--debug`/`--boring` switches.
 */
export const makeCli = (): Command => {
  const cli = new Command();
  cli
    .name('wfmon')
    .description(
      'Follow workflow engine logs and scheduler queues: live progress, ETA, and failure notifications.',
    )
    .option('-d, --debug', 'enable verbose debug logging')
    .option('-b, --boring', 'disable all color and styling (useful for tests/CI)')
    .option('-v, --version', 'print version');

  // Propagate -d/-b to the environment before any subcommand action.
  cli.hook('preAction', () => {
    const opts = cli.opts<{ debug?: boolean; boring?: boolean }>();
    if (opts.debug) process.env.WFMON_DEBUG = '1';
    if (opts.boring) {
      process.env.WFMON_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    }
  });

  registerMonitors(cli);
  registerControl(cli);

  cli.action(() => {
    if (cli.opts<{ version?: boolean }>().version) {
      const pkg = readPackageInfo();
      console.log(`${pkg.name} ${pkg.version}`);
      return;
    }
    // Print help without .help(), which exits.
    console.log(cli.helpInformation());
  });

  applyCliSafety(cli);
  return cli;
};
