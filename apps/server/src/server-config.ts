import { parseLogLevel } from "@deckname/core";
import type { LogLevel } from "@deckname/core";
import { DEFAULT_TEMPLATE, MAX_FILENAME_LENGTH, validateTemplate } from "@deckname/naming";

export interface ServerConfig {
  port: number;
  authToken: string;
  renameWorkers: number;
  undoTtlSeconds: number;
  defaultTemplate: string;
  maxFilenameLength: number;
  logLevel: LogLevel;
}

export function loadServerConfig(env: NodeJS.ProcessEnv): ServerConfig {
  const port = normalizeNonNegativeInt(env.PORT, 3000);
  const authToken = env.AUTH_TOKEN?.trim() ?? "";
  const renameWorkers = normalizePositiveInt(env.RENAME_WORKERS, 4);
  const undoTtlSeconds = normalizePositiveInt(env.UNDO_TTL_SECONDS, 600);
  const maxFilenameLength = Math.max(16, normalizePositiveInt(env.MAX_FILENAME_LENGTH, MAX_FILENAME_LENGTH));
  const logLevel = parseLogLevel(env.LOG_LEVEL);

  const defaultTemplate = env.DEFAULT_TEMPLATE?.trim() || DEFAULT_TEMPLATE;
  const validation = validateTemplate(defaultTemplate);
  if (!validation.valid) {
    throw new Error(`DEFAULT_TEMPLATE is invalid: ${validation.errors.join("; ")}`);
  }

  return {
    port,
    authToken,
    renameWorkers,
    undoTtlSeconds,
    defaultTemplate,
    maxFilenameLength,
    logLevel
  };
}

function normalizePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(1, Math.floor(parsed));
}

function normalizeNonNegativeInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(0, Math.floor(parsed));
}
