import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { REQUEST_ID_HEADER } from '../middleware/request-id.middleware';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const { method, url } = request;
    const started = Date.now();

    return next.handle().pipe(
      tap({
        complete: () => {
          const header = request.headers[REQUEST_ID_HEADER];
          const requestId = typeof header === 'string' ? ` [${header}]` : '';
          this.logger.log(`${method} ${url} ${Date.now() - started}ms${requestId}`);
        },
      }),
    );
  }
}
