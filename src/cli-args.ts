import { ReportScope } from './pipeline/types/pipeline.types';

export type CliCommand =
  | { name: 'collect'; windowHours?: number }
  | { name: 'classify'; windowHours?: number; snapshotFile?: string }
  | { name: 'report'; scope: ReportScope; period?: string }
  | { name: 'run-all' };

export type CliParseResult =
  | { ok: true; command: CliCommand }
  | { ok: false; error: string };

export const CLI_USAGE = [
  'Usage: postwatch <command> [options]',
  '',
  'Commands:',
  '  collect [--window H]                       fetch new posts into a snapshot',
  '  classify [--window H] [--snapshot FILE]    classify and summarize a snapshot',
  '  report --scope S [--period P]              S: single|daily|weekly|monthly',
  '  run-all                                    collect, classify, single report',
].join('\n');

const SCOPES: ReportScope[] = ['single', 'daily', 'weekly', 'monthly'];

const ALLOWED_FLAGS: Record<CliCommand['name'], string[]> = {
  collect: ['window'],
  classify: ['window', 'snapshot'],
  report: ['scope', 'period'],
  'run-all': [],
};

function isCommandName(value: string): value is CliCommand['name'] {
  return Object.prototype.hasOwnProperty.call(ALLOWED_FLAGS, value);
}

// Accepts `--flag value` and `--flag=value`.
function readFlags(
  args: string[],
): { ok: true; flags: Map<string, string> } | { ok: false; error: string } {
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      return { ok: false, error: `unexpected argument: ${arg}` };
    }
    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const value = eq >= 0 ? arg.slice(eq + 1) : args[i + 1];
    if (value === undefined || (eq < 0 && value.startsWith('--'))) {
      return { ok: false, error: `--${name} needs a value` };
    }
    if (eq < 0) {
      i += 1;
    }
    flags.set(name, value);
  }
  return { ok: true, flags };
}

function parseWindow(raw: string | undefined): number | null | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

export function parseCliArgs(argv: string[]): CliParseResult {
  const [name, ...rest] = argv;
  if (!name) {
    return { ok: false, error: 'missing command' };
  }
  if (!isCommandName(name)) {
    return { ok: false, error: `unknown command: ${name}` };
  }

  const read = readFlags(rest);
  if (!read.ok) {
    return read;
  }
  const { flags } = read;
  const unknown = [...flags.keys()].find(
    (flag) => !ALLOWED_FLAGS[name].includes(flag),
  );
  if (unknown) {
    return { ok: false, error: `unknown option for ${name}: --${unknown}` };
  }

  const windowHours = parseWindow(flags.get('window'));
  if (windowHours === null) {
    return { ok: false, error: '--window must be a positive number of hours' };
  }

  switch (name) {
    case 'collect':
      return { ok: true, command: { name, windowHours } };
    case 'classify':
      return {
        ok: true,
        command: { name, windowHours, snapshotFile: flags.get('snapshot') },
      };
    case 'report': {
      const rawScope = flags.get('scope');
      const scope = SCOPES.find((candidate) => candidate === rawScope);
      if (!scope) {
        return {
          ok: false,
          error: `--scope must be one of ${SCOPES.join(', ')}`,
        };
      }
      return {
        ok: true,
        command: { name, scope, period: flags.get('period') },
      };
    }
    case 'run-all':
      return { ok: true, command: { name } };
  }
}
