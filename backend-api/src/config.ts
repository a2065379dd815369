import 'dotenv/config';

export type BackendConfig = {
  dataFile: string;
  port: number;
  host: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const port = Number(env.PORT ?? 3001);
  return {
    dataFile: String(env.TURBINETRACK_DATA_FILE ?? '').trim() || 'data.json',
    port: Number.isInteger(port) && port > 0 ? port : 3001,
    // Localhost by default; set HOST=0.0.0.0 to expose it.
    host: String(env.HOST ?? '').trim() || '127.0.0.1',
  };
}
