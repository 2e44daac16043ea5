import pino from 'pino';

const level = process.env['LOG_LEVEL'] || 'info';

export const logger = pino({
  name: 'catalog-sync',
  level,
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
  },
});
