import { z } from 'zod';

export const APP_CONFIG = 'APP_CONFIG';

/**
 * Origen de los enlaces de descarga devueltos por /api/resolve
 */
export const LINK_SOURCES = ['guessed', 'placeholder', 'extracted'] as const;

export type LinkSource = (typeof LINK_SOURCES)[number];

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export type AppLogLevel = (typeof LOG_LEVELS)[number];

/**
 * Variables de entorno aceptadas por el servicio
 */
export const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
  METADATA_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  LINK_SOURCE: z.enum(LINK_SOURCES).default('guessed'),
  YTDLP_BIN: z.string().min(1).default('yt-dlp'),
  YTDLP_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  API_DEV: z.string().min(1).default('@yt-link-resolver'),
  API_CHANNEL: z.string().min(1).default('@yt-link-resolver'),
});

export interface AppConfig {
  host: string;
  port: number;
  logLevel: AppLogLevel;
  metadataTimeoutMs: number;
  fallbackTimeoutMs: number;
  linkSource: LinkSource;
  ytDlpBin: string;
  ytDlpTimeoutMs: number;
  attribution: {
    developer: string;
    channel: string;
  };
}

/**
 * Construye la configuración a partir del entorno del proceso.
 * Lanza un error con todas las variables inválidas si la validación falla.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuración inválida: ${problems}`);
  }

  const parsed = result.data;
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    metadataTimeoutMs: parsed.METADATA_TIMEOUT_MS,
    fallbackTimeoutMs: parsed.FALLBACK_TIMEOUT_MS,
    linkSource: parsed.LINK_SOURCE,
    ytDlpBin: parsed.YTDLP_BIN,
    ytDlpTimeoutMs: parsed.YTDLP_TIMEOUT_MS,
    attribution: {
      developer: parsed.API_DEV,
      channel: parsed.API_CHANNEL,
    },
  };
}

/**
 * Niveles que Nest debe emitir para un umbral dado
 */
export function resolveLogLevels(level: AppLogLevel): AppLogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
