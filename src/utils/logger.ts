import { getRuntimeConfig } from '../config/runtime.config.js';

const INSTANCE_ID = `${Date.now()}-${Math.random()
  .toString(36)
  .slice(2, 11)}`;

export interface LogDetails {
  [key: string]: unknown;
}

// stdout carries the result line only; every diagnostic goes to stderr
export function logWithContext(
  context: string,
  message: string,
  details?: LogDetails,
): void {
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${context}] [${INSTANCE_ID}]`;
  if (details && Object.keys(details).length > 0) {
    console.error(`${prefix} ${message}`, JSON.stringify(details));
  } else {
    console.error(`${prefix} ${message}`);
  }
}

export function debugWithContext(
  context: string,
  message: string,
  details?: LogDetails,
): void {
  if (!getRuntimeConfig().debug) return;
  logWithContext(context, message, details);
}
