import type { NestMiddleware } from '@nestjs/common';
import { Inject, Injectable } from '@nestjs/common';
import type { ServerResponse } from 'node:http';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ensureRequestId, type Logger } from '@shootline/common';

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  constructor(@Inject('APP_LOGGER') private readonly logger: Logger) {}

  use(req: FastifyRequest & { requestId?: string }, res: FastifyReply | ServerResponse, next: () => void) {
    const header = req.headers['x-request-id'];
    const requestId = ensureRequestId(typeof header === 'string' ? header : undefined);
    const response = 'raw' in res ? res.raw : res;

    req.requestId = requestId;
    response.setHeader('x-request-id', requestId);

    this.logger.info('request_received', {
      request_id: requestId,
      method: req.method,
      path: req.url
    });

    response.on('finish', () => {
      const meta = {
        request_id: requestId,
        method: req.method,
        path: req.url,
        status_code: response.statusCode
      };
      if (response.statusCode >= 500) {
        this.logger.error('request_failed', meta);
      } else {
        this.logger.info('request_completed', meta);
      }
    });

    next();
  }
}
