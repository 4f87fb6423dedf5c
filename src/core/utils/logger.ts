import pino from 'pino';

// Set log level via env LOG_LEVEL (default: info)
// Logs go to stderr; stdout is reserved for CLI results
const level = process.env.LOG_LEVEL || 'info';
const plain =
  process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test';

const logger = plain
  ? pino({ level }, pino.destination(2))
  : pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 }
      }
    });

export interface LogMeta {
  url?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error?.message,
      stack: error?.stack,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static sitemapRead(url: string, urlCount: number, duration: number, fallback: boolean): void {
    this.info(`Sitemap read: ${urlCount} candidate URLs`, { url, count: urlCount, duration, fallback });
  }
  static pageFailed(url: string, attempt: number, error: Error): void {
    this.warn(`Page fetch failed, skipping: ${url}`, { url, attempt, error: error.message });
  }
  static matchFound(title: string, url: string, matches: number): void {
    this.info(`Match: ${title}`, { url, matches });
  }
  static samplingFinished(attempts: number, matches: number, interrupted: boolean, duration: number): void {
    if (interrupted) {
      this.warn('Sampling interrupted, returning what was found so far', { attempts, matches, duration });
      return;
    }
    this.info(`Sampling done: ${matches} match(es) in ${attempts} attempt(s)`, { attempts, matches, duration });
  }
}
