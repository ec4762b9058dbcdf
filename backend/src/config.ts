export type AppConfig = {
  port: number;
  openaiApiKey?: string;
  openaiModel: string;
  openaiProject?: string;
  maxTokens: number;
  youtubeApiKey?: string;
  maxUploadBytes: number;
};

export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_MAX_TOKENS = 150;
const DEFAULT_PORT = 3000;
const DEFAULT_MAX_UPLOAD_MB = 25;

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`[Config] Ignoring ${name}=${JSON.stringify(raw)}; using ${fallback}`);
    return fallback;
  }
  return parsed;
}

/**
 * Reads the environment once. Everything downstream receives the returned object
 * instead of consulting process.env.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readPositiveInt(env, "PORT", DEFAULT_PORT),
    openaiApiKey: readString(env, "OPENAI_API_KEY"),
    openaiModel: readString(env, "OPENAI_MODEL") ?? DEFAULT_MODEL,
    openaiProject: readString(env, "OPENAI_PROJECT"),
    maxTokens: readPositiveInt(env, "OPENAI_MAX_TOKENS", DEFAULT_MAX_TOKENS),
    youtubeApiKey: readString(env, "YOUTUBE_API_KEY"),
    maxUploadBytes: readPositiveInt(env, "MAX_UPLOAD_MB", DEFAULT_MAX_UPLOAD_MB) * 1024 * 1024,
  };
}

export function keyFingerprint(key: string): string {
  if (key.length <= 10) return "[short-key]";
  return `${key.slice(0, 6)}...${key.slice(-4)}`;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
