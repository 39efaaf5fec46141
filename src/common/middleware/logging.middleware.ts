import { Injectable, NestMiddleware, Logger, Optional } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ConfigService } from '@nestjs/config';

export interface LogEntry {
  timestamp: string;
  method: string;
  url: string;
  statusCode: number;
  responseTime: number;
  contentLength: number;
  userAgent?: string;
  ip?: string;
  status: 'success' | 'error';
}

export type LogFormat = 'json' | 'text';

const RESET = '\x1b[0m';

function statusColor(statusCode: number): string {
  if (statusCode >= 400) return '\x1b[31m';
  if (statusCode >= 300) return '\x1b[33m';
  return '\x1b[32m';
}

@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');
  private readonly enabled: boolean;
  private readonly format: LogFormat;

  constructor(@Optional() private readonly configService?: ConfigService) {
    this.enabled = configService?.get<boolean>('LOG_HTTP_REQUESTS', true) ?? true;
    this.format = configService?.get<string>('LOG_FORMAT', 'text') === 'json' ? 'json' : 'text';
  }

  use(req: Request, res: Response, next: NextFunction): void {
    if (!this.enabled) {
      next();
      return;
    }

    const startTime = Date.now();

    res.on('finish', () => {
      this.logRequest({
        timestamp: new Date().toISOString(),
        method: req.method,
        url: req.originalUrl || req.url,
        statusCode: res.statusCode,
        responseTime: Date.now() - startTime,
        contentLength: Number(res.getHeader('content-length') ?? 0),
        userAgent: req.get('User-Agent'),
        ip: req.ip || req.socket?.remoteAddress,
        status: res.statusCode >= 400 ? 'error' : 'success',
      });
    });

    next();
  }

  formatEntry(entry: LogEntry): string {
    if (this.format === 'json') {
      return JSON.stringify(entry);
    }

    const statusIcon = entry.status === 'success' ? '✓' : '✗';
    return `${statusIcon} ${statusColor(entry.statusCode)}${entry.method} ${entry.url}${RESET} ${entry.statusCode} ${entry.responseTime}ms (${entry.contentLength}b)`;
  }

  private logRequest(entry: LogEntry): void {
    const message = this.formatEntry(entry);

    // 503 from a health endpoint is an expected answer, not a server fault
    if (entry.statusCode >= 500 && entry.statusCode !== 503) {
      this.logger.error(message);
    } else if (entry.status === 'error') {
      this.logger.warn(message);
    } else {
      this.logger.log(message);
    }
  }
}
