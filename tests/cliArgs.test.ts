import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../src/cliArgs.js';
import { InputError } from '../src/core/errors.js';

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs(['targets.txt'])).toEqual({
      inputPath: 'targets.txt',
      verbosity: 'discovery',
      jsMode: 'pattern',
    });
  });

  it('accepts the js mode aliases', () => {
    expect(parseCliArgs(['t.txt', '--jsmode', 'exec'])).toMatchObject({ jsMode: 'evaluation' });
    expect(parseCliArgs(['t.txt', '--jsmode', 'REGEX'])).toMatchObject({ jsMode: 'pattern' });
  });

  it('reads concurrency, output and verbosity', () => {
    expect(parseCliArgs(['t.txt', '--mode', 'quiet', '--concurrency', '12', '--output', 'out.txt'])).toEqual({
      inputPath: 't.txt',
      verbosity: 'quiet',
      jsMode: 'pattern',
      concurrency: 12,
      outputPath: 'out.txt',
    });
  });

  it('returns help for -h', () => {
    expect(parseCliArgs(['-h'])).toBe('help');
  });

  it('throws InputError on invalid values', () => {
    expect(() => parseCliArgs(['t.txt', '--mode', 'loud'])).toThrow(InputError);
    expect(() => parseCliArgs(['t.txt', '--jsmode', 'ast'])).toThrow(InputError);
    expect(() => parseCliArgs(['t.txt', '--concurrency', '0'])).toThrow(InputError);
    expect(() => parseCliArgs(['t.txt', '--concurrency', '2.5'])).toThrow(InputError);
    expect(() => parseCliArgs([])).toThrow(InputError);
    expect(() => parseCliArgs(['a.txt', 'b.txt'])).toThrow(InputError);
  });
});
