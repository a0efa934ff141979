import { loadConfig } from './config-loader';

export function isVerbose(): boolean {
  return loadConfig().logging.verbose;
}

/**
 * Progress output for library code; silent unless verbose logging is on
 */
export function logVerbose(message: string): void {
  if (isVerbose()) {
    console.log(message);
  }
}

export function warnVerbose(message: string): void {
  if (isVerbose()) {
    console.warn(message);
  }
}
