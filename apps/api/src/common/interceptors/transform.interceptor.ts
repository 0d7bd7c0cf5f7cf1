import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export interface ResponseMeta {
  timestamp: string;
  [key: string]: unknown;
}

export interface ResponseEnvelope<T> {
  data: T;
  meta: ResponseMeta;
}

function isEnvelope(body: unknown): body is { data: unknown; meta?: unknown } {
  return typeof body === 'object' && body !== null && !Array.isArray(body) && 'data' in body;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Every successful body leaves as `{ data, meta }`. Controllers that already return
 * `{ data }` keep their own meta keys; the timestamp is added alongside them.
 */
@Injectable()
export class TransformInterceptor implements NestInterceptor<unknown, ResponseEnvelope<unknown>> {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<ResponseEnvelope<unknown>> {
    return next.handle().pipe(
      map((body: unknown) => {
        const timestamp = new Date().toISOString();
        if (isEnvelope(body)) {
          const meta = isRecord(body.meta) ? body.meta : {};
          return { ...body, meta: { ...meta, timestamp } };
        }
        return { data: body, meta: { timestamp } };
      }),
    );
  }
}
