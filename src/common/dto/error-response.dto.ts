/**
 * Body of every error produced outside the health handlers
 */
export interface ErrorResponseDto {
  status: 'error';
  httpStatus: number;
  timestamp: string;
  path: string;
  error: string;
}
