import { config as loadEnv } from 'dotenv';
import { createApp } from './app';
import { loadConfig, SERVICE_NAME } from './config';
import { PdfRenderer } from './services/PdfRenderer';
import { shutdownGracefully } from './shutdown';

function main(): void {
  loadEnv();

  const config = loadConfig();
  const renderer = new PdfRenderer(config.renderer);
  const app = createApp(config, renderer);

  const server = app.listen(config.port, config.host, () => {
    console.log(`[SERVER] ${SERVICE_NAME} listening on ${config.host}:${config.port}`);
    console.log(`[SERVER] Allowed origins: ${config.allowedOrigins.join(', ')}`);
    console.log('[SERVER] Available endpoints: /, /health, /generate-pdf, /generate-pdf-base64');
  });

  // Graceful shutdown
  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(`[SERVER] ${signal} received, shutting down gracefully`);
    shutdownGracefully(server, renderer).then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[SERVER] Failed to close renderer:', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

try {
  main();
} catch (error) {
  console.error('[SERVER] Failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
}
