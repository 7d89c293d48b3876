import { ThrottlerGuard } from '@nestjs/throttler';
import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class UserThrottlerGuard extends ThrottlerGuard {
  private readonly logger = new Logger(UserThrottlerGuard.name);

  /**
   * Operators are throttled by their x-user-id header, anonymous callers by IP.
   */
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    const headers = req.headers;
    const rawUserId = typeof headers === 'object' && headers !== null ? Reflect.get(headers, 'x-user-id') : undefined;
    const userId = typeof rawUserId === 'string' && rawUserId ? rawUserId : undefined;
    const ip = typeof req.ip === 'string' ? req.ip : 'unknown';
    const tracker = userId ?? ip;

    this.logger.debug(`Throttle check for ${String(req.method)} ${String(req.url)} (tracker: ${tracker})`);
    return tracker;
  }
}
