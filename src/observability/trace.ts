import { v4 as uuidv4 } from 'uuid';
import pino from 'pino';
import { childLogger } from './logger';

/** Logger for one handled request, tagged with a fresh request id */
export function requestLogger(route: string, paymentId?: string): pino.Logger {
  return childLogger(uuidv4(), { route, ...(paymentId ? { paymentId } : {}) });
}
