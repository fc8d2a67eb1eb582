/**
 * docx-crosslink command-line entry point
 */

import { getErrorMessage } from '@/types/errors';
import { USAGE } from './cliArgs';
import { runCli } from './cliRunner';

runCli(process.argv.slice(2), (text) => {
  process.stdout.write(`${text}\n`);
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${getErrorMessage(error)}`);
    console.error(USAGE);
    process.exitCode = 1;
  });
