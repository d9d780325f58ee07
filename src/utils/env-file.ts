/**
 * Loads .env format configuration files for the --config option
 */
import { parse as dotenvParse } from 'dotenv';
import { readFileSync } from 'fs';

/**
 * Result of loading an env file
 */
export interface EnvFileResult {
  success: boolean;
  values?: Record<string, string>;
  error?: string;
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Load and parse a .env format configuration file
 */
export function loadEnvFile(filepath: string): EnvFileResult {
  try {
    const content = readFileSync(filepath, 'utf-8');
    return {
      success: true,
      values: dotenvParse(content),
    };
  } catch (err) {
    switch (errnoCode(err)) {
      case 'ENOENT':
        return { success: false, error: `Config file not found: ${filepath}` };
      case 'EACCES':
        return { success: false, error: `Permission denied reading config file: ${filepath}` };
      case 'EISDIR':
        return { success: false, error: `Config file is a directory: ${filepath}` };
      default:
        return {
          success: false,
          error: `Failed to read config file ${filepath}: ${err instanceof Error ? err.message : String(err)}`,
        };
    }
  }
}
