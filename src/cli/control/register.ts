// src/cli/control/register.ts
import { Argument, type Command } from 'commander';

import { reportActionError } from '@/cli/monitor/register';
import { ENGINE_KINDS, isEngineKind } from '@/monitor/types';

import { runStatus, runStop } from './action';

export const registerControl = (cli: Command): void => {
  cli
    .command('status')
    .description('health check: list running monitors and remove stale state')
    .addArgument(new Argument('[engine]', 'limit to one engine').choices(ENGINE_KINDS))
    .action(async (engine: string | undefined) => {
      try {
        process.exitCode = await runStatus(engine && isEngineKind(engine) ? engine : undefined);
      } catch (e) {
        reportActionError(e);
      }
    });

  cli
    .command('stop')
    .description('signal the running monitor for an engine and remove its state')
    .addArgument(new Argument('<engine>', 'engine whose monitor to stop').choices(ENGINE_KINDS))
    .action(async (engine: string) => {
      try {
        if (!isEngineKind(engine)) return;
        process.exitCode = await runStop(engine);
      } catch (e) {
        reportActionError(e);
      }
    });
};
