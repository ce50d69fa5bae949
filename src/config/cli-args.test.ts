import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './cli-args.js';

describe('parseCliArgs', () => {
  it('takes the entry file after leading flags', () => {
    expect(parseCliArgs(['--verbose', 'main.idl'])).toEqual({
      entrypoint: 'main.idl',
      envFile: undefined,
      extension: undefined,
      verbose: true,
      help: false,
    });
  });

  it('skips the values of flags that take one', () => {
    const args = parseCliArgs(['--env', '.env.test', '--ext', '.arf', 'schema/root.arf']);

    expect(args.entrypoint).toBe('schema/root.arf');
    expect(args.envFile).toBe('.env.test');
    expect(args.extension).toBe('.arf');
    expect(args.verbose).toBe(false);
  });

  it('leaves the entry file unset when only flags are given', () => {
    expect(parseCliArgs(['--verbose', '--ext', '.arf']).entrypoint).toBeUndefined();
  });

  it('asks for help with no arguments or a help flag', () => {
    expect(parseCliArgs([]).help).toBe(true);
    expect(parseCliArgs(['main.idl', '-h']).help).toBe(true);
    expect(parseCliArgs(['main.idl']).help).toBe(false);
  });
});
