import {
  CallHandler,
  ExecutionContext,
  Inject,
  Injectable,
  NestInterceptor,
  RequestTimeoutException,
} from '@nestjs/common';
import { Response } from 'express';
import { Observable, throwError } from 'rxjs';
import { finalize, timeout } from 'rxjs/operators';
import { APP_CONFIG, AppConfig } from '../../config/configuration';
import { SignalledRequest } from '../interfaces/signalled-request.interface';

/**
 * Gives every request an AbortSignal and a deadline. The signal aborts when
 * the deadline passes (the client gets a 408) or when the connection closes
 * before the response was written.
 */
@Injectable()
export class TimeoutInterceptor implements NestInterceptor {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<SignalledRequest>();
    const response = http.getResponse<Response>();

    const controller = new AbortController();
    request.abortSignal = controller.signal;

    const onClose = () => {
      if (!response.writableFinished) {
        controller.abort(new Error('Client closed the connection'));
      }
    };
    response.on('close', onClose);

    return next.handle().pipe(
      timeout({
        first: this.config.requestTimeoutMs,
        with: () => {
          controller.abort(new Error(`Request timed out after ${this.config.requestTimeoutMs}ms`));
          return throwError(() => new RequestTimeoutException('Request timed out'));
        },
      }),
      finalize(() => response.off('close', onClose)),
    );
  }
}
