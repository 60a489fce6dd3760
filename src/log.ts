import pino from 'pino';

export const log = pino({
  name: 'live-call-relay',
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'live-call-relay' },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});
