import pino from 'pino';
import { config } from './config';

export const logger = pino({
  name: 'gradebook-api',
  level: config.logLevel,
});
