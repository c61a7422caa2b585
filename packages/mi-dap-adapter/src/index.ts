#!/usr/bin/env node
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import {
  BackendStartError,
  LOG_LEVELS,
  Session,
  createStderrLogger,
  isLogLevel,
} from 'mi-dap-core';
import { resolveBackendConfig } from './config';
import { DapServer } from './server';

export { DapServer } from './server';
export { RequestDispatcher } from './requestDispatcher';
export { DapErrorBuilder, ERROR_IDS } from './errorUtils';
export { resolveBackendConfig } from './config';

async function main(): Promise<void> {
  const argv = yargs(hideBin(process.argv))
    .scriptName('mi-dap-adapter')
    .option('gdb-path', {
      type: 'string',
      description: 'GDB executable to start (overrides the configuration file)',
    })
    .option('config', {
      type: 'string',
      description: 'Path to a JSON file with backend settings',
    })
    .option('log-level', {
      type: 'string',
      choices: [...LOG_LEVELS],
      default: 'info',
      description: 'Minimum level written to stderr',
    })
    .strict()
    .help()
    .parseSync();

  const logger = createStderrLogger(isLogLevel(argv['log-level']) ? argv['log-level'] : 'info');
  const config = resolveBackendConfig(logger, {
    configPath: argv.config,
    gdbPath: argv['gdb-path'],
  });

  let session: Session;
  try {
    session = await Session.start(config, logger);
  } catch (error) {
    if (error instanceof BackendStartError) {
      logger.fatal?.({ err: error, stage: error.stage, stderr: error.stderrOutput }, error.message);
      process.exit(1);
    }
    throw error;
  }

  const server = new DapServer(session, logger);
  const shutdown = (reason: string): void => {
    logger.info(`Shutting down: ${reason}`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  session.onBackendExit((exitCode) => shutdown(`GDB exited with code ${exitCode}`));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.listen();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    createStderrLogger().error({ err: error }, 'Debug adapter failed to start');
    process.exit(1);
  });
}
