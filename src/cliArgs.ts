/**
 * Command-line parsing: turns argv into a handler name plus a raw request
 * object. Values are validated later by the handler's schema.
 */

import { InputError } from '@/types/errors';

export const COMMANDS = [
  'scan',
  'links',
  'export-links',
  'find-replace',
  'bulk-find-replace',
  'bulk-links-find-replace',
  'analyze',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface CliInvocation {
  command: CommandName;
  request: Record<string, unknown>;
  configFile?: string;
}

export const USAGE = `Usage: docx-crosslink <command> <path> [options]

Commands:
  scan <folder>                        folder tree of eligible documents
  links <folder>                       links of every document, plus the dependency graph
  export-links <folder> [--out file]   links workbook (default links.xlsx)
  find-replace <file> --find text [--replace text]
  bulk-find-replace <folder> --find text [--replace text] [--no-copies]
  bulk-links-find-replace <folder> --find text [--replace text]
                         [--target name|url|both] [--no-copies]
  analyze <file>                       track-changes flag and links

Options:
  --config <file>                      configuration file`;

function isCommand(value: string | undefined): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export function parseCliArgs(argv: string[]): CliInvocation {
  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new InputError(command ? `Unknown command: ${command}` : 'No command given');
  }

  const request: Record<string, unknown> = {};
  let configFile: string | undefined;

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith('--')) {
      throw new InputError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '--find':
        request.findText = valueOf(arg, rest[++i]);
        break;
      case '--replace':
        request.replaceText = valueOf(arg, rest[++i]);
        break;
      case '--target':
        request.target = valueOf(arg, rest[++i]);
        break;
      case '--out':
        request.outPath = valueOf(arg, rest[++i]);
        break;
      case '--no-copies':
        request.saveCopies = false;
        break;
      case '--config':
        configFile = valueOf(arg, rest[++i]);
        break;
      default:
        if (arg.startsWith('--')) {
          throw new InputError(`Unknown option: ${arg}`);
        }
        if (request.path !== undefined) {
          throw new InputError(`Unexpected argument: ${arg}`);
        }
        request.path = arg;
    }
  }

  if (command === 'export-links' && request.outPath === undefined) {
    request.outPath = 'links.xlsx';
  }

  const invocation: CliInvocation = { command, request };
  if (configFile) {
    invocation.configFile = configFile;
  }
  return invocation;
}
