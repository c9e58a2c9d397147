// Gateway entry point: load the route table, start the HTTP server
import { validateConfig, config } from './config';
import { createApp } from './app';
import { PerRequestRouteSource, WatchedRouteSource, type RouteSource } from './routing/routeSource';
import { JwtTokenVerifier } from './services/tokenVerifier';

async function main(): Promise<void> {
  validateConfig();

  let routes: RouteSource;
  let watched: WatchedRouteSource | undefined;
  if (config.routesReload === 'watch') {
    watched = new WatchedRouteSource(config.routesFile);
    const table = await watched.load();
    watched.watch();
    console.log(`Loaded ${table.length} routes from ${config.routesFile} (watching for changes)`);
    routes = watched;
  } else {
    routes = new PerRequestRouteSource(config.routesFile);
    console.log(`Routes are read from ${config.routesFile} on every request`);
  }

  const app = createApp({
    routes,
    verifier: new JwtTokenVerifier(config.jwtSecret),
    backendTimeoutMs: config.backendTimeoutMs,
    healthPath: config.healthPath,
  });

  const server = app.listen(config.port, () => {
    console.log(`Gateway running on port ${config.port}`);
    console.log(`Environment: ${config.nodeEnv}`);
  });

  // Reload the route table on demand without a restart
  process.on('SIGHUP', () => {
    watched?.reload().catch(() => undefined);
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    watched?.close();
    server.close(() => {
      console.log('Gateway server closed');
      process.exit(0);
    });
  });
}

main().catch((err: unknown) => {
  console.error('Gateway failed to start:', err);
  process.exit(1);
});
