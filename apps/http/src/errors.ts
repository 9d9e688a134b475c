import { ZodError } from 'zod';
import { errorMessage, isAssistantError } from '@tapwise/core';

export interface ClassifiedError {
  code: string;
  status: number;
  message: string;
}

function httpStatusOf(e: unknown): number | undefined {
  if (typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number') {
    return e.statusCode;
  }
  return undefined;
}

export function classifyError(e: unknown): ClassifiedError {
  const message = errorMessage(e);
  if (e instanceof ZodError) return { code: 'VALIDATION', status: 400, message };
  if (isAssistantError(e)) {
    const status =
      e.code === 'VALIDATION' ? 400 :
      e.code === 'TIMEOUT' ? 504 :
      e.code === 'CONFIG' ? 503 : 500;
    return { code: e.code, status, message };
  }
  // fastify's own 4xx (bad JSON body, rate limit)
  const status = httpStatusOf(e);
  if (status !== undefined && status >= 400 && status < 500) {
    return { code: status === 429 ? 'RATE_LIMITED' : 'VALIDATION', status, message };
  }
  return { code: 'INTERNAL', status: 500, message };
}

export function zodDetails(e: ZodError): Array<{ path: string; msg: string; code: string }> {
  return e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
}
