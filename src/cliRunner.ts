/**
 * Runs one CLI invocation: parse, load config, call the handler, print JSON.
 *
 * Log lines go to stderr; `writeOut` receives only usage text or the
 * handler's JSON result.
 */

import { loadConfig, type AppConfig } from '@/config/appConfig';
import {
  analyze,
  bulkFindReplace,
  bulkLinks,
  bulkLinksFindReplace,
  exportLinksXlsx,
  findReplace,
  scanDirectory,
} from '@/api/handlers';
import { initializeLogging, logger } from '@/utils/logger';
import { type CommandName, USAGE, parseCliArgs } from './cliArgs';

type Handler = (request: unknown, config: AppConfig) => Promise<{ success: boolean }>;

export type WriteOutput = (text: string) => void;

const handlers: Record<CommandName, Handler> = {
  scan: scanDirectory,
  links: bulkLinks,
  'export-links': exportLinksXlsx,
  'find-replace': findReplace,
  'bulk-find-replace': bulkFindReplace,
  'bulk-links-find-replace': bulkLinksFindReplace,
  analyze,
};

/**
 * @returns the process exit code (1 when the handler reports a failure)
 * @throws InputError for bad arguments or configuration
 */
export async function runCli(argv: string[], writeOut: WriteOutput): Promise<number> {
  logger.useStderr();

  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    writeOut(USAGE);
    return argv.length === 0 ? 1 : 0;
  }

  const { command, request, configFile } = parseCliArgs(argv);
  const config = loadConfig({ configFile });
  initializeLogging(config);

  const result = await handlers[command](request, config);
  writeOut(JSON.stringify(result, null, 2));
  return result.success ? 0 : 1;
}
