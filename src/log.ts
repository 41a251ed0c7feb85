import 'dotenv/config';
import pino from 'pino';

export const log = pino({
  name: 'voice-bridge-runtime',
  level: process.env.LOG_LEVEL && process.env.LOG_LEVEL.trim() !== '' ? process.env.LOG_LEVEL : 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof log;
