import { Server } from 'http';
import { HtmlRenderer } from './services/PdfRenderer';

/**
 * Stop accepting connections, wait for in-flight requests to finish,
 * then close the renderer.
 */
export function shutdownGracefully(server: Server, renderer: HtmlRenderer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        console.warn('[SERVER] Server was not running:', error.message);
      }
      renderer.close().then(resolve, reject);
    });
  });
}
