export interface NotesConfig {
  mongoUri: string;
  port: number;
  host: string;
}

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = '0.0.0.0';

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): NotesConfig {
  const mongoUri = env['MONGODB_URI'];
  if (!mongoUri) {
    throw new Error('MONGODB_URI is required');
  }

  let port = DEFAULT_PORT;
  const portValue = env['PORT'];
  if (portValue !== undefined && portValue !== '') {
    const parsed = Number(portValue);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new Error('PORT must be a positive integer when set');
    }
    port = parsed;
  }

  return {
    mongoUri,
    port,
    host: env['HOST'] || DEFAULT_HOST,
  };
}
