import { Controller, Get, Req } from '@nestjs/common';
import type { Request } from 'express';
import { createLogger } from '../../common/utils/logger';

export interface HealthResponse {
  status: 'ok';
  service: string;
  timestamp: string;
}

@Controller('health')
export class HealthController {
  private readonly logger = createLogger(HealthController.name);

  @Get()
  check(@Req() req: Request): HealthResponse {
    this.logger.debug('health_check_request', {
      event: 'health_check_request',
      request_id: req.requestId ?? null,
      request_origin: req.headers.origin ?? null,
    });

    return {
      status: 'ok',
      service: 'stock-catalog-print',
      timestamp: new Date().toISOString(),
    };
  }
}
