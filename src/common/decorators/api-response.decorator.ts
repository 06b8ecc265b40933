import { SetMetadata } from '@nestjs/common';

export const API_RESPONSE_KEY = 'apiResponse';

export interface ApiResponseOptions {
  message?: string;
}

export const ApiResponseWrapper = (options: ApiResponseOptions = {}) =>
  SetMetadata(API_RESPONSE_KEY, options);
