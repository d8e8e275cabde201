export type CliCommand =
  | { command: 'help' }
  | { command: 'start' }
  | { command: 'health' }
  | { command: 'recipes' }
  | { command: 'rediscover'; maxTracks?: number; useAi?: boolean; varietyContext?: string }
  | { command: 'this-is'; artistId: string; maxTracks?: number; varietyContext?: string };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

interface Flags {
  tracks?: number;
  noAi: boolean;
  context?: string;
  positional: string[];
}

const parsePositiveInt = (value: string | undefined, flag: string): number => {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`${flag} expects a positive whole number`);
  }
  return parsed;
};

const parseFlags = (args: readonly string[]): Flags => {
  const flags: Flags = { noAi: false, positional: [] };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--tracks':
      case '-n':
        flags.tracks = parsePositiveInt(args[++i], arg);
        break;
      case '--no-ai':
        flags.noAi = true;
        break;
      case '--context': {
        const value = args[++i];
        if (value === undefined) {
          throw new CliUsageError('--context expects a value');
        }
        flags.context = value;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new CliUsageError(`Unknown option '${arg}'`);
        }
        flags.positional.push(arg);
    }
  }
  return flags;
};

/**
 * Parse argv (without node and script path) into a command.
 */
export const parseCommandLine = (argv: readonly string[]): CliCommand => {
  const [command, ...rest] = argv;

  switch (command) {
    case undefined:
    case 'start':
    case 'server':
      return { command: 'start' };
    case '--help':
    case '-h':
    case 'help':
      return { command: 'help' };
    case 'health':
    case 'diagnostic':
      return { command: 'health' };
    case 'recipes':
      return { command: 'recipes' };
    case 'rediscover': {
      const flags = parseFlags(rest);
      return {
        command: 'rediscover',
        maxTracks: flags.tracks,
        useAi: flags.noAi ? false : undefined,
        varietyContext: flags.context
      };
    }
    case 'this-is': {
      const flags = parseFlags(rest);
      const [artistId] = flags.positional;
      if (!artistId) {
        throw new CliUsageError('this-is requires an artist id');
      }
      if (flags.noAi) {
        throw new CliUsageError('--no-ai is only supported by rediscover');
      }
      return { command: 'this-is', artistId, maxTracks: flags.tracks, varietyContext: flags.context };
    }
    default:
      throw new CliUsageError(`Unknown command '${command}'`);
  }
};
