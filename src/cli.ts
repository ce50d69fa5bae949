#!/usr/bin/env node

import { compile, CompilationError, createLogger, loadEnv, resolveCompilerConfig, COMPILER_DEFAULTS } from './index.js';
import { parseCliArgs } from './config/cli-args.js';

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(`
idlc - Front-end compiler for the service IDL

Usage:
  idlc <file.idl> [options]

Options:
  --verbose            Log each compilation stage to stderr
  --env <file>         Path to .env file (default: .env then .env.local in current directory)
  --ext <extension>    Source file extension appended to imports (default: ${COMPILER_DEFAULTS.FILE_EXTENSION})
  --help, -h           Show this help message

Environment Variables:
  IDLC_EXTENSION       Same as --ext
  IDLC_VERBOSE         Same as --verbose (true/false)

Examples:
  idlc api/main.idl
  idlc api/main.idl --verbose
  idlc schema/root.arf --ext .arf
`);
    return 0;
  }

  const { entrypoint } = args;
  if (!entrypoint) {
    console.error('Error: no entry file given');
    return 1;
  }

  const envResult = loadEnv({ envFile: args.envFile });
  const config = resolveCompilerConfig();

  const extension = args.extension ?? config.extension;
  const verbose = args.verbose || config.verbose === true;

  const logger = createLogger(COMPILER_DEFAULTS.LOG_PREFIX, !verbose);
  if (envResult.loaded) {
    logger.debug(`Loaded ${envResult.count} variable(s) from ${envResult.files.join(', ')}`);
  }

  try {
    const tree = await compile(entrypoint, { extension, logger });

    for (const pkg of tree.packages.values()) {
      console.log(
        `package ${pkg.name}: ${pkg.structs.length} struct(s), ${pkg.enums.length} enum(s), ` +
          `${pkg.services.length} service(s) in ${pkg.files.length} file(s)`
      );
    }
    return 0;
  } catch (error) {
    if (error instanceof CompilationError) {
      console.error(error.format());
      console.error(`\n${error.diagnostics.length} error(s) during ${error.stage}`);
      return 1;
    }
    throw error;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
);
