/** Shared Commander helpers for the wfmon CLI.
 * DRY the exitOverride + argv normalization across commands.
 */
import { type Command, InvalidArgumentError } from 'commander';

const isStringArray = (v: unknown): v is readonly string[] =>
  Array.isArray(v) && v.every((t) => typeof t === 'string');

/** Normalize argv from unit tests like ["node","wfmon", ...] -> [...] */
export const normalizeArgv = (
  argv?: readonly string[],
): readonly string[] | undefined => {
  if (!isStringArray(argv)) return undefined;
  if (argv.length >= 2 && argv[0] === 'node' && argv[1] === 'wfmon') {
    return argv.slice(2);
  }
  return argv;
};

/** Patch parseAsync() to normalize argv before Commander parses. */
export const patchParseMethods = (cli: Command): void => {
  const origParseAsync = cli.parseAsync.bind(cli);
  cli.parseAsync = async (argv, opts) => {
    const normalized = normalizeArgv(argv);
    await origParseAsync(normalized, normalized === argv ? opts : { from: 'user' });
    return cli;
  };
};

/**
 * Never let Commander call process.exit: record the exit code and rethrow.
 * Help and version exit 0; usage errors exit 2.
 */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    process.exitCode = err.exitCode === 0 ? 0 : 2;
    throw err;
  });
};

/** Apply both safety adapters to a command and its subcommands. */
export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
  for (const sub of cmd.commands) installExitOverride(sub);
  patchParseMethods(cmd);
}

export const parsePositiveInt = (label: string) => (value: string): number => {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`${label} must be a positive integer`);
  }
  return n;
};
