import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  name: 'learning-plan',
  level: env.LOG_LEVEL,
  base: env.NODE_ENV === 'production' ? undefined : { env: env.NODE_ENV },
});
