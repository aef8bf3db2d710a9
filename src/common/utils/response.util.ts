export interface ApiError {
  title: string;
  message: string | object;
}

export interface ApiSuccess<T> {
  success: true;
  data: T;
  timestamp: string;
}

export interface ApiFailure {
  success: false;
  error: ApiError;
  timestamp: string;
}

export function successResponse<T>(data: T): ApiSuccess<T> {
  return { success: true, data, timestamp: new Date().toISOString() };
}

export function failureResponse(error: ApiError): ApiFailure {
  return { success: false, error, timestamp: new Date().toISOString() };
}
