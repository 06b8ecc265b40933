import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { SignalledRequest } from '../interfaces/signalled-request.interface';

/**
 * Injects the request's AbortSignal, which aborts when the client disconnects
 * or the request times out.
 */
export const RequestSignal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AbortSignal | undefined => {
    return ctx.switchToHttp().getRequest<SignalledRequest>().abortSignal;
  },
);
