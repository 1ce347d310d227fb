import { isLogLevel } from './logger';
import type { LogLevel } from './logger';

export type AppConfig = {
  logLevel: LogLevel;
  // Directory holding preferences.json.
  homeDir: string;
  // Project file opened at startup, if any.
  initialFile: string | null;
};

export type EnvRecord = Record<string, string | undefined>;

// Reads configuration from environment variables and command-line arguments.
export function readConfig(env: EnvRecord, argv: readonly string[], defaultHomeDir: string): AppConfig {
  const rawLevel = env.TERMPIX_LOG_LEVEL?.trim().toLowerCase() ?? '';
  const homeDir = env.TERMPIX_HOME?.trim();
  const initialFile = argv.find((arg) => !arg.startsWith('-')) ?? null;

  return {
    logLevel: isLogLevel(rawLevel) ? rawLevel : 'off',
    homeDir: homeDir ? homeDir : defaultHomeDir,
    initialFile
  };
}
