import puppeteer, { Browser, Page, PDFOptions } from 'puppeteer-core';
import { RendererConfig } from '../config';
import { RenderError } from '../errors';

/**
 * HTML to PDF rendering capability. Implementations reject with RenderError.
 */
export interface HtmlRenderer {
  render(html: string): Promise<Buffer>;
  close(): Promise<void>;
}

/**
 * Headless Chromium renderer. One browser per process, one page per render.
 */
export class PdfRenderer implements HtmlRenderer {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly config: RendererConfig) {}

  /**
   * Launch the browser on first use, or again after it disconnected.
   * Concurrent callers share the same launch.
   */
  private async getBrowser(): Promise<Browser> {
    const current = this.browser;
    if (current) {
      const browser = await current;
      if (browser.connected) {
        return browser;
      }
      // Another caller already replaced the dead browser
      if (this.browser !== current) {
        return this.getBrowser();
      }
      console.warn('[RENDERER] Browser disconnected, relaunching');
      this.browser = null;
    }

    console.log('[RENDERER] Launching browser', { executablePath: this.config.executablePath });
    const launching: Promise<Browser> = puppeteer
      .launch({
        executablePath: this.config.executablePath,
        headless: true,
        args: [
          '--no-sandbox',
          '--disable-setuid-sandbox',
          '--disable-dev-shm-usage',
          '--disable-gpu'
        ]
      })
      .catch((error: unknown) => {
        if (this.browser === launching) {
          this.browser = null;
        }
        throw error;
      });
    this.browser = launching;

    return launching;
  }

  /**
   * Render HTML to PDF bytes. No timeout: the call waits as long as Chromium takes.
   */
  async render(html: string): Promise<Buffer> {
    let page: Page | null = null;

    try {
      const browser = await this.getBrowser();
      page = await browser.newPage();

      await page.setContent(html, {
        waitUntil: 'networkidle0',
        timeout: 0
      });

      const { margin } = this.config;
      const pdfOptions: PDFOptions = {
        format: this.config.format,
        printBackground: this.config.printBackground,
        margin: { top: margin, right: margin, bottom: margin, left: margin },
        timeout: 0
      };

      return Buffer.from(await page.pdf(pdfOptions));
    } catch (error) {
      throw RenderError.from(error);
    } finally {
      if (page) {
        await page.close().catch((error: unknown) => {
          console.warn('[RENDERER] Failed to close page:', error instanceof Error ? error.message : error);
        });
      }
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      const pending = this.browser;
      this.browser = null;
      const browser = await pending;
      await browser.close();
      console.log('[RENDERER] Browser closed');
    }
  }
}
