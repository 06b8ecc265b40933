import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { ApiResponse } from '../interfaces/api-response.interface';
import { API_RESPONSE_KEY, ApiResponseOptions } from '../decorators/api-response.decorator';

@Injectable()
export class ApiResponseInterceptor implements NestInterceptor {
  constructor(private reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<ApiResponse> {
    const options = this.reflector.get<ApiResponseOptions | undefined>(
      API_RESPONSE_KEY,
      context.getHandler(),
    );

    return next.handle().pipe(
      map((data: unknown) => {
        const response: ApiResponse = {
          status: 'success',
          data: data ?? null,
          message: options?.message || this.getDefaultMessage(context),
          timestamp: new Date().toISOString(),
        };

        return response;
      }),
    );
  }

  private getDefaultMessage(context: ExecutionContext): string {
    const httpMethod = context.switchToHttp().getRequest<Request>().method;
    return `${httpMethod} operation completed successfully`;
  }
}
