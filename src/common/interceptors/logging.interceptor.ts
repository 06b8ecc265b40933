import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { errorMessage, errorStack } from '../errors';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();

    const { method, originalUrl: url, ip, body, query, params } = request;
    const userAgent = request.get('user-agent') || '';
    const startTime = Date.now();

    const requestDetails = this.buildRequestDetails(body, query, params);

    this.logger.log(
      `${method} ${url} | IP: ${ip}${userAgent ? ` | UA: ${userAgent.substring(0, 50)}` : ''}${requestDetails ? ` | ${requestDetails}` : ''}`
    );

    return next.handle().pipe(
      tap({
        next: () => {
          const responseTime = Date.now() - startTime;
          this.logger.log(`${method} ${url} ${response.statusCode} | ${responseTime}ms`);
        },
        error: (error: unknown) => {
          const responseTime = Date.now() - startTime;
          const statusCode = error instanceof HttpException ? error.getStatus() : 500;

          const line = `${method} ${url} ${statusCode} | ${responseTime}ms | Error: ${errorMessage(error)}`;
          if (statusCode >= 500) {
            this.logger.error(line, errorStack(error));
          } else {
            this.logger.warn(line);
          }
        },
      }),
    );
  }

  /**
   * Build request details string for the log line
   */
  private buildRequestDetails(body: unknown, query: unknown, params: unknown): string {
    const details: string[] = [];

    if (this.hasKeys(query)) {
      details.push(`Query: ${JSON.stringify(query)}`);
    }

    if (this.hasKeys(body)) {
      details.push(`Body: ${JSON.stringify(body)}`);
    }

    if (this.hasKeys(params)) {
      details.push(`Params: ${JSON.stringify(params)}`);
    }

    return details.join(' | ');
  }

  private hasKeys(value: unknown): boolean {
    return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
  }
}
