import pino from 'pino';

export const loggerPrefix = '[Toggle SDK]';

function defaultLevel(): string {
  switch (process.env.NODE_ENV) {
    case 'production':
      return 'warn';
    case 'test':
      return 'silent';
    default:
      return 'info';
  }
}

export const logger = pino({
  name: 'toggle-server-sdk',
  level: process.env.TOGGLE_SDK_LOG_LEVEL ?? defaultLevel(),
});
