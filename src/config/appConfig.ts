/**
 * Application configuration
 *
 * Sources, later wins: defaults, JSON config file, environment variables.
 * The resolved value is passed explicitly into every service call.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { InputError } from '@/types/errors';

export const CONFIG_FILE_NAME = 'docx-crosslink.config.json';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'verbose', 'silly']);

export const appConfigSchema = z.object({
  /** Eligible document extension (lower-case, with dot) */
  documentExtension: z.string().min(2).startsWith('.'),
  /** Prefix of editor lock/temporary files, never processed */
  lockFilePrefix: z.string().min(1),
  /** Collaboration-hub domain token; matching links are internal or document links */
  hubDomain: z.string().min(1),
  /** Organisation keyword token; matching links are internal */
  orgKeyword: z.string().min(1),
  /** Subfolder that receives pre-mutation copies */
  backupFolderName: z.string().min(1),
  /** Preferred parent of the backup folder when it exists */
  desktopDir: z.string().min(1),
  logLevel: logLevelSchema.optional(),
  logFile: z.string().optional(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export const defaultConfig: AppConfig = {
  documentExtension: '.docx',
  lockFilePrefix: '~$',
  hubDomain: 'contoso.sharepoint.com',
  orgKeyword: 'contoso',
  backupFolderName: 'bulk_found',
  desktopDir: path.join(os.homedir(), 'Desktop'),
};

const ENV_KEYS: Record<string, keyof AppConfig> = {
  DOCX_CROSSLINK_HUB_DOMAIN: 'hubDomain',
  DOCX_CROSSLINK_ORG_KEYWORD: 'orgKeyword',
  DOCX_CROSSLINK_BACKUP_FOLDER: 'backupFolderName',
  DOCX_CROSSLINK_DESKTOP_DIR: 'desktopDir',
  DOCX_CROSSLINK_LOG_LEVEL: 'logLevel',
  DOCX_CROSSLINK_LOG_FILE: 'logFile',
};

function expandHome(value: string): string {
  if (value === '~' || value.startsWith('~/') || value.startsWith('~\\')) {
    return path.join(os.homedir(), value.slice(1));
  }
  return value;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read config file ${filePath}`, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InputError(`Config file ${filePath} is not valid JSON`, error);
  }

  const objectResult = z.record(z.unknown()).safeParse(parsed);
  if (!objectResult.success) {
    throw new InputError(`Config file ${filePath} must contain a JSON object`);
  }
  return objectResult.data;
}

export interface LoadConfigOptions {
  /** Explicit config file; otherwise DOCX_CROSSLINK_CONFIG, then ./docx-crosslink.config.json */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Resolve the effective configuration
 *
 * @throws InputError when the file is unreadable or a value fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const merged: Record<string, unknown> = { ...defaultConfig };

  const explicitFile = options.configFile ?? env.DOCX_CROSSLINK_CONFIG;
  const configFile = explicitFile ?? path.join(cwd, CONFIG_FILE_NAME);
  if (explicitFile || fs.existsSync(configFile)) {
    Object.assign(merged, readConfigFile(configFile));
  }

  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      merged[configKey] = value;
    }
  }

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InputError(`Invalid configuration: ${issues}`, result.error.issues);
  }

  const config = result.data;
  return {
    ...config,
    documentExtension: config.documentExtension.toLowerCase(),
    desktopDir: expandHome(config.desktopDir),
    logFile: config.logFile ? expandHome(config.logFile) : undefined,
  };
}
