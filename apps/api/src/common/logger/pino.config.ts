import pino from 'pino';

const serviceName = process.env.SERVICE_NAME || 'mapping-etl-api';

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV !== 'development') {
    // stdout JSON
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export function createLogger(level = process.env.LOG_LEVEL || 'info'): pino.Logger {
  const config: pino.LoggerOptions = {
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: buildTransport(),
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
        service: serviceName,
      }),
    },
  };

  return pino(config);
}
