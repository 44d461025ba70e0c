import { HttpException } from '@nestjs/common';

export interface ResolvedError {
  status: number;
  message: string;
}

/**
 * Flatten a Nest HttpException body (string, or `{ message }` with a string or a list
 * of validation messages) into one line.
 */
export function httpExceptionMessage(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') {
    return body;
  }
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
}
