import { env } from 'node:process';

const truthy = new Set(['1', 'true', 'yes', 'on']);

let debugEnabled = truthy.has((env.DEBUG ?? '').trim().toLowerCase());

export const setDebugEnabled = (enabled: boolean): void => {
  debugEnabled = enabled;
};

export const debug = (message: string, details?: unknown): void => {
  if (!debugEnabled) return;
  if (details === undefined) {
    console.debug('[debug]', message);
    return;
  }
  console.debug('[debug]', message, details);
};
