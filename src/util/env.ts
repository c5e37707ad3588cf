import { existsSync } from 'fs';
import { ConfigurationError, errorMessage } from '../errors.js';

/**
 * Loads KEY=value pairs from an optional dotenv file into `process.env`.
 * Returns false when the file does not exist. Must run before commander
 * parses, since `Option.env()` reads the environment at parse time.
 */
export function loadDotEnv(path = '.env'): boolean {
  if (!existsSync(path)) return false;

  try {
    process.loadEnvFile(path);
  } catch (err) {
    throw new ConfigurationError(`Failed to load ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return true;
}
