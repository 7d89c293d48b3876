import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

// Bulk payloads can carry thousands of rows; only the shape is logged.
function describeBody(body: unknown): string {
  if (body === null || typeof body !== 'object') {
    return typeof body;
  }
  if (Array.isArray(body)) {
    return `array(${body.length})`;
  }
  const parts = Object.entries(body).map(([key, value]) =>
    Array.isArray(value) ? `${key}[${value.length}]` : key,
  );
  return `{ ${parts.join(', ')} }`;
}

@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger('RequestLogger');

  use(req: Request, res: Response, next: NextFunction) {
    const startTime = Date.now();
    const { method, originalUrl, headers } = req;
    const userId = headers['x-user-id'] ?? 'unknown';
    const requestId = uuidv4().slice(0, 8);

    this.logger.log(
      `[${requestId}] [${method}] ${originalUrl}` +
      `\nUser: ${String(userId)}` +
      `\nUA: ${headers['user-agent'] ?? 'n/a'}` +
      `\nBody: ${describeBody(req.body)}`
    );

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      const line = `[${requestId}] [${method}] ${originalUrl} - Status: ${res.statusCode} - Duration: ${duration}ms`;
      if (res.statusCode >= 500) {
        this.logger.error(line);
      } else if (res.statusCode >= 400) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    });

    next();
  }
}
