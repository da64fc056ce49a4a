/**
 * Application configuration, read once from the environment at startup
 */

export const DEFAULT_REALTIME_BASE_URL = 'https://military-jobye-haiqstudios-14f59639.koyeb.app';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  realtimeBaseUrl: string;
  // Empty or unset disables the primary financials provider
  eodhdApiKey?: string;
  // Undefined allows every origin
  allowedOrigins?: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number.parseInt(env.PORT ?? '', 10);
  const origins = env.ALLOWED_ORIGINS?.split(',').map(o => o.trim()).filter(o => o.length > 0);

  return {
    port: Number.isFinite(port) ? port : 10000,
    nodeEnv: env.NODE_ENV || 'development',
    realtimeBaseUrl: (env.REALTIME_API_BASE_URL || DEFAULT_REALTIME_BASE_URL).replace(/\/+$/, ''),
    eodhdApiKey: env.EODHD_API_KEY?.trim() || undefined,
    allowedOrigins: origins && origins.length > 0 ? origins : undefined,
  };
}
