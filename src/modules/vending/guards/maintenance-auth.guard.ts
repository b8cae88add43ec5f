import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import * as crypto from 'crypto';
import { ConfigurationService } from '../services/configuration.service';

/**
 * Bearer-key guard for the maintenance endpoints.
 * Without a configured key the endpoints answer 404 as if absent.
 */
@Injectable()
export class MaintenanceAuthGuard implements CanActivate {
  private readonly logger = new Logger(MaintenanceAuthGuard.name);

  constructor(private readonly configService: ConfigurationService) {}

  canActivate(context: ExecutionContext): boolean {
    const apiKey = this.configService.getMaintenanceApiKey();
    if (!apiKey) {
      throw new NotFoundException();
    }

    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers.authorization ?? '';
    const [scheme, token] = header.split(' ');

    if (scheme !== 'Bearer' || !token || !this.keysMatch(token, apiKey)) {
      this.logger.warn(
        `Rejected maintenance request ${request.method} ${request.url} from ${request.ip ?? 'unknown'}`,
      );
      throw new UnauthorizedException('Invalid maintenance key');
    }

    return true;
  }

  /**
   * Constant-time comparison; hashing first equalizes the lengths
   */
  private keysMatch(candidate: string, expected: string): boolean {
    const a = crypto.createHash('sha256').update(candidate).digest();
    const b = crypto.createHash('sha256').update(expected).digest();
    return crypto.timingSafeEqual(a, b);
  }
}
