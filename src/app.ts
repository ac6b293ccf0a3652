import express, { Express } from 'express';
import cors from 'cors';
import { ServiceConfig } from './config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createGenerateRouter } from './routes/generate';
import { createHealthRouter } from './routes/health';
import { HtmlRenderer } from './services/PdfRenderer';

export function createApp(config: ServiceConfig, renderer: HtmlRenderer): Express {
  const app = express();

  // A lone '*' reflects the caller's origin so credentialed requests still work
  app.use(
    cors({
      origin: config.allowedOrigins.includes('*') ? true : [...config.allowedOrigins],
      credentials: true,
      methods: ['POST', 'GET', 'OPTIONS']
    })
  );
  app.use(express.json({ limit: '10mb' })); // Allow large HTML payloads

  // Routes
  app.use('/', createHealthRouter(renderer));
  app.use('/', createGenerateRouter(config.apiKey, renderer));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
