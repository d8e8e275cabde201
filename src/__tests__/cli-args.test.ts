import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCommandLine } from '../cli-args.js';

describe('parseCommandLine', () => {
  it('starts the scheduler by default', () => {
    expect(parseCommandLine([])).toEqual({ command: 'start' });
    expect(parseCommandLine(['server'])).toEqual({ command: 'start' });
  });

  it('recognises help, health and recipes', () => {
    expect(parseCommandLine(['-h'])).toEqual({ command: 'help' });
    expect(parseCommandLine(['diagnostic'])).toEqual({ command: 'health' });
    expect(parseCommandLine(['recipes'])).toEqual({ command: 'recipes' });
  });

  it('parses rediscover options', () => {
    expect(parseCommandLine(['rediscover', '-n', '25', '--no-ai', '--context', 'more jazz'])).toEqual({
      command: 'rediscover',
      maxTracks: 25,
      useAi: false,
      varietyContext: 'more jazz'
    });
    expect(parseCommandLine(['rediscover'])).toEqual({
      command: 'rediscover',
      maxTracks: undefined,
      useAi: undefined,
      varietyContext: undefined
    });
  });

  it('parses this-is with an artist id', () => {
    expect(parseCommandLine(['this-is', '--tracks', '30', 'ar1'])).toEqual({
      command: 'this-is',
      artistId: 'ar1',
      maxTracks: 30,
      varietyContext: undefined
    });
  });

  it.each([
    [['this-is'], 'this-is requires an artist id'],
    [['this-is', 'ar1', '--no-ai'], '--no-ai is only supported by rediscover'],
    [['rediscover', '--tracks', '0'], '--tracks expects a positive whole number'],
    [['rediscover', '-n', '2.5'], '-n expects a positive whole number'],
    [['rediscover', '-n'], '-n expects a positive whole number'],
    [['rediscover', '--context'], '--context expects a value'],
    [['rediscover', '--verbose'], "Unknown option '--verbose'"],
    [['shuffle'], "Unknown command 'shuffle'"]
  ])('rejects %j', (argv, message) => {
    expect(() => parseCommandLine(argv)).toThrow(CliUsageError);
    expect(() => parseCommandLine(argv)).toThrow(message);
  });
});
