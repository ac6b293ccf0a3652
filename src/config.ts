/**
 * Service configuration, read once from the environment at start-up
 */
import { PaperFormat } from 'puppeteer-core';
import { ConfigError } from './errors';

export const SERVICE_NAME = 'HTML PDF Service';
export const SERVICE_VERSION = '1.0.0';

export const DEFAULT_API_KEY = 'default-dev-key-change-in-production';

const SUPPORTED_FORMATS = ['A4', 'Letter'] as const satisfies readonly PaperFormat[];

export type PageFormat = (typeof SUPPORTED_FORMATS)[number];

export interface RendererConfig {
  readonly executablePath: string;
  readonly format: PageFormat;
  readonly margin: string;
  readonly printBackground: boolean;
}

export interface ServiceConfig {
  readonly apiKey: string;
  readonly allowedOrigins: readonly string[];
  readonly host: string;
  readonly port: number;
  readonly renderer: RendererConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  // WEASYPRINT_API_KEY is the name existing deployments were provisioned with
  const apiKey = env.PDF_SERVICE_API_KEY || env.WEASYPRINT_API_KEY || DEFAULT_API_KEY;
  if (apiKey === DEFAULT_API_KEY) {
    console.warn(
      '[CONFIG] Neither PDF_SERVICE_API_KEY nor WEASYPRINT_API_KEY is set; using the development default. Do not run this in production.'
    );
  }

  return Object.freeze({
    apiKey,
    allowedOrigins: Object.freeze(parseOrigins(env.ALLOWED_ORIGINS)),
    host: env.HOST || '0.0.0.0',
    port: parsePort(env.PORT),
    renderer: Object.freeze({
      executablePath: env.CHROMIUM_PATH || '/usr/bin/chromium',
      format: parseFormat(env.PDF_FORMAT),
      margin: env.PDF_MARGIN || '10mm',
      printBackground: true
    })
  });
}

function parseOrigins(value: string | undefined): string[] {
  const origins = (value ?? '*')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length > 0 ? origins : ['*'];
}

function parsePort(value: string | undefined): number {
  if (!value) {
    return 8000;
  }
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${value}"`);
  }
  return port;
}

function parseFormat(value: string | undefined): PageFormat {
  if (!value) {
    return 'A4';
  }
  const format = SUPPORTED_FORMATS.find((candidate) => candidate.toLowerCase() === value.toLowerCase());
  if (!format) {
    throw new ConfigError(`PDF_FORMAT must be one of ${SUPPORTED_FORMATS.join(', ')}, got "${value}"`);
  }
  return format;
}
