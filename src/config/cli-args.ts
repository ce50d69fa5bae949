/**
 * Command-line flags of the `idlc` binary
 */
export interface CliArgs {
  /** First argument that is neither a flag nor a flag's value */
  entrypoint?: string;
  envFile?: string;
  extension?: string;
  verbose: boolean;
  help: boolean;
}

// Flags that take the next argument as their value
const VALUE_FLAGS = new Set(['--env', '--ext']);

export function parseCliArgs(args: readonly string[]): CliArgs {
  const valueOf = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    return index !== -1 ? args[index + 1] : undefined;
  };

  return {
    entrypoint: args.find((arg, i) => !arg.startsWith('-') && !VALUE_FLAGS.has(args[i - 1] ?? '')),
    envFile: valueOf('--env'),
    extension: valueOf('--ext'),
    verbose: args.includes('--verbose'),
    help: args.length === 0 || args.includes('--help') || args.includes('-h'),
  };
}
