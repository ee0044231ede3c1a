import type { Server } from 'http';
import { createApp } from './app';
import { config, SCORING_VERSION } from './config';

let server: Server | null = null;

function start(): void {
  const app = createApp();
  const port = config.PORT;

  server = app.listen(port, () => {
    console.log(`[server] Node health scoring ${SCORING_VERSION} listening on port ${port}`);
    console.log(`[server] Endpoints:`);
    console.log(`  - GET  /health             (health check)`);
    console.log(`  - GET  /demo/sample        (example evaluation)`);
    console.log(`  - POST /node/evaluate      (score a node, ?format=text for the flat report)`);
    console.log(`  - POST /rate-limit/detect  (classify one endpoint's samples)`);
  });

  server.on('error', (err) => {
    console.error('[server] Failed to start:', err);
    process.exit(1);
  });
}

function shutdown(signal: string): void {
  console.log(`[server] Received ${signal}, shutting down...`);
  if (!server) {
    process.exit(0);
  }
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

// Run if main module
if (require.main === module) {
  start();
}
