export interface ApiResponse<T = unknown> {
  status: 'success';
  data: T;
  message: string;
  timestamp: string;
}
