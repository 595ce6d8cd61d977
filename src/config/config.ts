import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { describeError } from '../utils/errors';

export interface AppConfig {
  // Where downloaded tracks are written
  outputDir: string;
  
  // Conversion service
  serviceHost: string;
  defaultServer: string;
  token?: string;
  tokenTtlDays: number;
  userAgent: string;
  country: string;
  downscale: string;
  
  // Polling and transfer
  pollIntervalMs: number;
  pollTimeoutMs: number;
  chunkSize: number;
  
  // File naming
  filenamePrefix: string;
  maxFilenameLength: number;
}

export const CONFIG_FILE_NAME = 'tidalrip.config.json';

// Default configuration
export const defaultConfig: AppConfig = {
  outputDir: process.cwd(),
  
  serviceHost: 'lucida.to',
  defaultServer: 'katze',
  tokenTtlDays: 30,
  userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36',
  country: 'auto',
  downscale: 'original',
  
  pollIntervalMs: 2000,
  pollTimeoutMs: 5 * 60 * 1000,
  chunkSize: 8192,
  
  filenamePrefix: 'tidal',
  maxFilenameLength: 150
};

const fileConfigSchema = z
  .object({
    outputDir: z.string().min(1),
    serviceHost: z.string().min(1),
    defaultServer: z.string().min(1),
    token: z.string().min(1),
    tokenTtlDays: z.number().positive(),
    userAgent: z.string(),
    country: z.string().min(1),
    downscale: z.string().min(1),
    pollIntervalMs: z.number().int().positive(),
    pollTimeoutMs: z.number().int().positive(),
    chunkSize: z.number().int().positive(),
    filenamePrefix: z.string().min(1),
    maxFilenameLength: z.number().int().positive()
  })
  .partial();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// Printed as a JSON line like the rest of the CLI output
function warn(message: string): void {
  console.warn(JSON.stringify({ status: 'warning', message }));
}

function readConfigFile(configFilePath: string): FileConfig {
  try {
    if (!fs.existsSync(configFilePath)) {
      return {};
    }
    
    const parsed = fileConfigSchema.safeParse(JSON.parse(fs.readFileSync(configFilePath, 'utf8')));
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      warn(`Invalid config in ${configFilePath} (${issues}), using defaults`);
      return {};
    }
    
    return parsed.data;
  } catch (error) {
    warn(`Error loading config from ${configFilePath} (${describeError(error)}), using defaults`);
    return {};
  }
}

function readEnvironment(env: NodeJS.ProcessEnv): FileConfig {
  const fromEnv: FileConfig = {};
  
  if (env.TIDALRIP_TOKEN) {
    fromEnv.token = env.TIDALRIP_TOKEN;
  }
  if (env.TIDALRIP_OUTPUT_DIR) {
    fromEnv.outputDir = env.TIDALRIP_OUTPUT_DIR;
  }
  
  return fromEnv;
}

/**
 * Load config: defaults, then the config file if it exists, then environment
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configFilePath = configPath || path.join(process.cwd(), CONFIG_FILE_NAME);
  const config: AppConfig = { ...defaultConfig, ...readConfigFile(configFilePath), ...readEnvironment(env) };
  
  config.outputDir = path.resolve(config.outputDir);
  return config;
}
