import { Controller, Get, Inject, ServiceUnavailableException } from '@nestjs/common';
import type { Logger } from '@shootline/common';
import { Public } from '../auth/public.decorator.js';
import { DatabaseService } from '../db/database.service.js';
import { ErrorCodes } from './errors.js';

const SERVICE = 'shootline-api';

@Controller('health')
export class HealthController {
  constructor(
    @Inject(DatabaseService) private readonly database: DatabaseService,
    @Inject('APP_LOGGER') private readonly logger: Logger
  ) {}

  @Get()
  @Public()
  async getHealth() {
    try {
      await this.database.transaction((tx) => tx.countDeals());
    } catch (error) {
      this.logger.error('health_check_failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      throw new ServiceUnavailableException({
        code: ErrorCodes.serviceUnavailable,
        message: 'database unreachable',
        ok: false,
        service: SERVICE,
        database: 'down'
      });
    }

    return {
      ok: true,
      service: SERVICE,
      database: 'up',
      ts: new Date().toISOString()
    };
  }
}
