import type { Response } from 'express';
import type { ApiResponse } from '../types';

export function sendData<T>(res: Response, data: T, message?: string, status = 200) {
  const body: ApiResponse<T> = { success: true, data };
  if (message) body.message = message;
  return res.status(status).json(body);
}
