import pino from 'pino';
import { CONFIG } from './config';

// stdout carries the human-readable report, so structured logs go to stderr.
const logger = pino(
  {
    name: 'netsweep',
    level: CONFIG.LOG_LEVEL,
  },
  pino.destination(2),
);

export default logger;
