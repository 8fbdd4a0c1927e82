import { pino } from 'pino';

import { env } from '../config/index.js';

// Key material can reach log bindings through option snapshots.
const redactPaths: string[] = [
  'key',
  'secret',
  '*.key',
  '*.secret',
  'options.key',
  'extraOptions.*'
];

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: true
      }
    }
  : undefined;

export const logger = pino({
  level: env.LOG_LEVEL,
  base: {
    lib: 'attribute-cipher',
    env: env.NODE_ENV
  },
  transport,
  redact: {
    paths: redactPaths,
    remove: true
  }
});
