import * as child_process from 'child_process';
import { LoggerInterface } from 'mi-dap-core';

/** Runs a program runner script and resolves with its exit code. */
export type ProgramRunner = (scriptPath: string) => Promise<number | null>;

/**
 * Runs `scriptPath` with bash and waits for it to finish. The script's
 * output goes to the adapter's own stdio.
 */
export function createBashProgramRunner(logger: LoggerInterface): ProgramRunner {
  return (scriptPath) =>
    new Promise((resolve, reject) => {
      logger.info(`Running program runner ${scriptPath}`);
      const child = child_process.spawn('/bin/bash', [scriptPath], { stdio: ['ignore', 'inherit', 'inherit'] });
      child.once('error', reject);
      child.once('exit', (code) => {
        logger.info(`Program runner exited with code ${code}`);
        resolve(code);
      });
    });
}
