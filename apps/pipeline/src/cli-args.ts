export type ArgValue = string | boolean;

/**
 * `--key value`, `--key=value` and bare `--flag` tokens. `--no-<key>` sets
 * `<key>` to false. Positionals are ignored.
 */
export const parseCliArgs = (argv: readonly string[]): Record<string, ArgValue> => {
  const args: Record<string, ArgValue> = {};
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      continue;
    }
    const eqIdx = token.indexOf('=');
    if (eqIdx !== -1) {
      args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
      continue;
    }
    const key = token.slice(2);
    if (key.startsWith('no-')) {
      args[key.slice(3)] = false;
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      args[key] = next;
      i += 1;
    } else {
      args[key] = true;
    }
  }
  return args;
};

export interface PipelineCliOptions {
  configPath?: string;
  dataPath?: string;
  /** false with --no-report */
  report: boolean;
}

function stringArg(args: Record<string, ArgValue>, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export const parsePipelineCliOptions = (argv: readonly string[]): PipelineCliOptions => {
  const args = parseCliArgs(argv);
  return {
    configPath: stringArg(args, 'config'),
    dataPath: stringArg(args, 'data'),
    report: args.report !== false,
  };
};
