import { Router, Request, Response } from 'express';
import { SERVICE_NAME, SERVICE_VERSION } from '../config';
import { errorMessage } from '../errors';
import { HtmlRenderer } from '../services/PdfRenderer';
import { HealthResponse, ServiceInfoResponse } from '../types';

const PROBE_HTML = '<html><body>Test</body></html>';

export function createHealthRouter(renderer: HtmlRenderer): Router {
  const router = Router();

  /**
   * GET /
   * Liveness, never touches the renderer
   */
  router.get('/', (_req: Request, res: Response) => {
    const response: ServiceInfoResponse = {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION
    };
    res.json(response);
  });

  /**
   * GET /health
   * Renders a probe document on every call. Always 200; failure is in the body.
   */
  router.get('/health', async (_req: Request, res: Response) => {
    let response: HealthResponse;

    try {
      await renderer.render(PROBE_HTML);
      response = {
        status: 'healthy',
        weasyprint: 'functional',
        pdf_generation: 'working'
      };
    } catch (error) {
      console.error('[HEALTH] Health check failed:', errorMessage(error));
      response = {
        status: 'unhealthy',
        error: errorMessage(error) || 'Unknown renderer error'
      };
    }

    res.json(response);
  });

  return router;
}
