/* src/cli/monitor/register.ts
 * One subcommand per engine, sharing the monitor flag set.
 */
import { type Command, Option } from 'commander';

import { parsePositiveInt } from '@/cli/cli-utils';
import { StartupError, UsageError } from '@/monitor/errors';
import type { EngineKind } from '@/monitor/types';
import { consoleLog } from '@/util/log';

import { type MonitorFlags, runMonitorCommand } from './action';

type EngineSpec = {
  engine: EngineKind;
  selector: string;
  description: string;
  extra?: (cmd: Command) => void;
};

const ENGINES: readonly EngineSpec[] = [
  {
    engine: 'snakemake',
    selector: '[log]',
    description:
      'monitor a Snakemake log (default logs/snakemake.log, else the newest .snakemake/log/*.snakemake.log)',
  },
  {
    engine: 'nextflow',
    selector: '[log]',
    description: 'monitor a Nextflow log (default .nextflow.log)',
    extra: (cmd) => cmd.option('-r, --run <name>', 'read .nextflow.log.<name>'),
  },
  {
    engine: 'wdl',
    selector: '[dir]',
    description:
      'monitor a Cromwell workflow-log directory (default cromwell-workflow-logs) or one workflow log',
  },
  {
    engine: 'slurm',
    selector: '[jobs]',
    description:
      'monitor SLURM jobs through sacct: a comma-separated job list, or every job of --user since start',
    extra: (cmd) => cmd.option('-u, --user <name>', 'user whose jobs to follow (default $USER)'),
  },
];

/** Map known errors to a one-line diagnostic and exit code 2. */
export const reportActionError = (e: unknown): void => {
  if (e instanceof UsageError || e instanceof StartupError) {
    consoleLog.error(e.message);
    process.exitCode = 2;
    return;
  }
  throw e;
};

export const registerMonitors = (cli: Command): void => {
  for (const spec of ENGINES) {
    const cmd = cli
      .command(spec.engine)
      .description(spec.description)
      .argument(spec.selector)
      .option(
        '-i, --interval <seconds>',
        'seconds between polls (env UPDATE_INTERVAL, default 10)',
        parsePositiveInt('interval'),
      )
      .addOption(new Option('-n, --notify', 'desktop notifications on failure and completion'))
      .addOption(new Option('-N, --no-notify', 'disable notifications (overrides ENABLE_NOTIFICATIONS)'))
      .option('-p, --pid <pid>', 'stop when this process exits', parsePositiveInt('pid'))
      .option('-x, --exec <command>', 'run the workflow command and stop when it exits');
    spec.extra?.(cmd);
    cmd.action(async (selector: string | undefined, opts: MonitorFlags) => {
      try {
        process.exitCode = await runMonitorCommand(spec.engine, selector, opts);
      } catch (e) {
        reportActionError(e);
      }
    });
  }
};
