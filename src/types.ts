import { z } from 'zod';

/**
 * Body of POST /generate-pdf and POST /generate-pdf-base64
 */
export const pdfRequestSchema = z.object({
  htmlContent: z.string(),
  customCss: z.string().nullish()
});

export type PdfRequest = z.infer<typeof pdfRequestSchema>;

export interface Base64PdfResponse {
  pdf: string; // Base64 encoded
  size: number; // Raw byte count
  encoding: 'base64';
}

export interface ServiceInfoResponse {
  status: 'healthy';
  service: string;
  version: string;
}

export type HealthResponse =
  | {
      status: 'healthy';
      // Field names kept from the first release of the service; pollers key on them
      weasyprint: 'functional';
      pdf_generation: 'working';
    }
  | {
      status: 'unhealthy';
      error: string;
    };

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export interface ErrorResponse {
  detail: string | ValidationIssue[];
}
