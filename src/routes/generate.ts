import { Router, Request, Response, NextFunction } from 'express';
import { apiKeyAuth } from '../middleware/auth';
import { validateBody } from '../middleware/validate';
import { injectCss } from '../services/cssInjector';
import { HtmlRenderer } from '../services/PdfRenderer';
import { RenderError } from '../errors';
import { Base64PdfResponse, ErrorResponse, PdfRequest, pdfRequestSchema } from '../types';

function kilobytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(2)}KB`;
}

/**
 * PDF generation routes
 * POST /generate-pdf         - raw application/pdf body
 * POST /generate-pdf-base64  - { pdf, size, encoding: 'base64' }
 */
export function createGenerateRouter(apiKey: string, renderer: HtmlRenderer): Router {
  const router = Router();
  const guards = [validateBody(pdfRequestSchema), apiKeyAuth(apiKey)];

  /**
   * Shared by both variants: embed the CSS, render, log size and timing.
   * Payload contents never reach the log.
   */
  async function renderPdf(body: PdfRequest): Promise<Buffer> {
    const startTime = Date.now();
    const html = injectCss(body.htmlContent, body.customCss);

    console.log('[GENERATE] Starting PDF generation', {
      htmlSize: kilobytes(Buffer.byteLength(html, 'utf8')),
      customCss: Boolean(body.customCss)
    });

    try {
      const pdf = await renderer.render(html);
      console.log('[GENERATE] PDF generated successfully', {
        fileSize: kilobytes(pdf.length),
        processingTime: `${Date.now() - startTime}ms`
      });
      return pdf;
    } catch (error) {
      const renderError = RenderError.from(error);
      console.error('[GENERATE] PDF generation failed:', renderError.cause ?? renderError);
      throw renderError;
    }
  }

  router.post('/generate-pdf', ...guards, async (req: Request, res: Response, next: NextFunction) => {
    try {
      // Parsed by validateBody
      const body: PdfRequest = req.body;
      const pdf = await renderPdf(body);

      res.status(200);
      res.set({
        'Content-Type': 'application/pdf',
        'Content-Disposition': 'attachment; filename=document.pdf',
        'Content-Length': String(pdf.length)
      });
      res.end(pdf);
    } catch (error) {
      next(error);
    }
  });

  router.post('/generate-pdf-base64', ...guards, async (req: Request, res: Response, next: NextFunction) => {
    try {
      // Parsed by validateBody
      const body: PdfRequest = req.body;
      const pdf = await renderPdf(body);

      const response: Base64PdfResponse = {
        pdf: pdf.toString('base64'),
        size: pdf.length,
        encoding: 'base64'
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // Known paths, wrong method
  router.all(['/generate-pdf', '/generate-pdf-base64'], (_req: Request, res: Response) => {
    const errorResponse: ErrorResponse = { detail: 'Method Not Allowed' };
    res.status(405).set('Allow', 'POST').json(errorResponse);
  });

  return router;
}
