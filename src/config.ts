// Gateway configuration from environment variables
import 'dotenv/config';

export const RELOAD_MODES = ['watch', 'request'] as const;
export type ReloadMode = (typeof RELOAD_MODES)[number];

function isReloadMode(value: string): value is ReloadMode {
  return (RELOAD_MODES as readonly string[]).includes(value);
}

function readReloadMode(): ReloadMode {
  const value = process.env['ROUTES_RELOAD'] ?? 'watch';
  return isReloadMode(value) ? value : 'watch';
}

export const config = {
  port: parseInt(process.env['GATEWAY_PORT'] ?? '4000', 10),
  routesFile: process.env['ROUTES_FILE'] ?? 'config/routes.json',
  routesReload: readReloadMode(),
  jwtSecret: process.env['JWT_SECRET'] ?? '',
  // 0 disables the timeout: backend calls wait until the backend answers or fails
  backendTimeoutMs: parseInt(process.env['BACKEND_TIMEOUT_MS'] ?? '0', 10),
  healthPath: process.env['HEALTH_PATH'] ?? '/_gateway/health',
  nodeEnv: process.env['NODE_ENV'] ?? 'development',
  isProduction: process.env['NODE_ENV'] === 'production',
} as const;

// Validate at startup (server.ts calls this before building the app)
export function validateConfig(): void {
  const reload = process.env['ROUTES_RELOAD'];
  if (reload !== undefined && !isReloadMode(reload)) {
    throw new Error(`Invalid ROUTES_RELOAD: ${reload} (expected one of ${RELOAD_MODES.join(', ')})`);
  }
  if (!Number.isInteger(config.port) || config.port < 0) {
    throw new Error(`Invalid GATEWAY_PORT: ${process.env['GATEWAY_PORT'] ?? ''}`);
  }
  if (!Number.isInteger(config.backendTimeoutMs) || config.backendTimeoutMs < 0) {
    throw new Error(`Invalid BACKEND_TIMEOUT_MS: ${process.env['BACKEND_TIMEOUT_MS'] ?? ''}`);
  }
  if (!config.jwtSecret) {
    console.warn('JWT_SECRET is not set: every route with auth enabled will reject its requests');
  }
}
