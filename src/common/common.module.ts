import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ApiResponseInterceptor } from './interceptors/api-response.interceptor';
import { TimeoutInterceptor } from './interceptors/timeout.interceptor';
import { CLOCK, systemClock } from './clock';

@Module({
  providers: [
    { provide: CLOCK, useValue: systemClock },
    {
      provide: APP_INTERCEPTOR,
      useClass: TimeoutInterceptor,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: ApiResponseInterceptor,
    },
  ],
  exports: [CLOCK],
})
export class CommonModule {}
