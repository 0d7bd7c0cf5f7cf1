import { Injectable, NestMiddleware } from '@nestjs/common';
import { IncomingMessage, ServerResponse } from 'http';
import { randomUUID } from 'crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  // NestJS middleware with Fastify receives raw Node.js objects
  use(req: IncomingMessage, res: ServerResponse, next: () => void) {
    const header = req.headers[REQUEST_ID_HEADER];
    const requestId = (Array.isArray(header) ? header[0] : header) || randomUUID();

    // Fastify's request.headers is the raw header object
    req.headers[REQUEST_ID_HEADER] = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    next();
  }
}
