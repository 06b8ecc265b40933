import { Request } from 'express';

/** Express request carrying the abort signal attached by the TimeoutInterceptor. */
export interface SignalledRequest extends Request {
  abortSignal?: AbortSignal;
}
