import 'dotenv/config';
import { buildApp, buildHttpServer, createAppDeps } from './app.js';

const PORT = parseInt(process.env['PORT'] ?? '3001', 10);

function main(): void {
  const deps = createAppDeps();
  const app = buildApp(deps);
  const { httpServer, wsGateway, stopLiveUpdates } = buildHttpServer(app, deps);

  httpServer.listen(PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${PORT}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    stopLiveUpdates();
    await wsGateway.close();
    httpServer.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

try {
  main();
} catch (err) {
  console.error('[server] fatal startup error', err);
  process.exit(1);
}
