export interface ApiSuccess<T = unknown> {
  success: true;
  message: string;
  info?: T;
}

export interface ApiError {
  success: false;
  error: {
    message: string;
    type: string;
  };
}

export type ApiResponse<T = unknown> = ApiSuccess<T> | ApiError;
