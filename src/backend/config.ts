import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
  port: number;
  sessionSecret: string;
  tokenUri: string;
  dataFile?: string;
  faucetEnabled: boolean;
  corsOrigins: string[];
}

export const DEFAULT_PORT = 3001;
export const DEFAULT_TOKEN_URI = 'https://story-registry.app/metadata/';

/**
 * Lee la configuración desde variables de entorno (.env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (!env.SESSION_SECRET) {
    throw new Error('SESSION_SECRET no está configurado en .env');
  }

  const port = env.PORT ? Number(env.PORT) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`PORT inválido: ${env.PORT}`);
  }

  return {
    port,
    sessionSecret: env.SESSION_SECRET,
    tokenUri: env.STORY_TOKEN_URI || DEFAULT_TOKEN_URI,
    dataFile: env.STORY_DATA_FILE || undefined,
    faucetEnabled: env.ENABLE_FAUCET === 'true',
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:5173')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}
