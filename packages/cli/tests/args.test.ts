import { describe, expect, it } from 'vitest';
import { arg, hasFlag, listArg, positionals } from '../src/utils/args.js';

describe('argv helpers', () => {
  const argv = ['episode.mp3', '--lang', 'ja-JP', '--verbose', '--only', 'art19, website', '--out'];

  it('reads flag values with a fallback', () => {
    expect(arg(argv, '--lang')).toBe('ja-JP');
    expect(arg(argv, '--metadata', 'none')).toBe('none');
    expect(arg(argv, '--out', 'result.json')).toBe('result.json');
  });

  it('does not take the next flag as a value', () => {
    expect(arg(['--lang', '--verbose'], '--lang', 'en-US')).toBe('en-US');
  });

  it('detects boolean flags', () => {
    expect(hasFlag(argv, '--verbose')).toBe(true);
    expect(hasFlag(argv, '--debug')).toBe(false);
  });

  it('splits comma lists', () => {
    expect(listArg(argv, '--only')).toEqual(['art19', 'website']);
    expect(listArg(argv, '--missing')).toBeUndefined();
  });

  it('collects positionals around flags', () => {
    expect(positionals(argv, ['--lang', '--only', '--out'])).toEqual(['episode.mp3']);
    expect(positionals(['--verbose', 'a.mp3', 'b.mp3'], [])).toEqual(['a.mp3', 'b.mp3']);
  });

  it('reads the --flag=value form', () => {
    const inline = ['episode.mp3', '--lang=ja-JP', '--only=twitter,website', '--out='];
    expect(arg(inline, '--lang', 'en-US')).toBe('ja-JP');
    expect(listArg(inline, '--only')).toEqual(['twitter', 'website']);
    expect(arg(inline, '--out', 'result.json')).toBe('result.json');
    expect(positionals(inline, ['--lang', '--only', '--out'])).toEqual(['episode.mp3']);
  });
});
