import pino from 'pino';

let processCorrelationId: string | undefined;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function getProcessCorrelationId(): string {
  if (!processCorrelationId) {
    processCorrelationId = generateCorrelationId();
  }
  return processCorrelationId;
}

function buildOptions(): pino.LoggerOptions {
  const level = process.env.LOG_LEVEL || 'info';
  const base: pino.LoggerOptions = {
    level,
    base: { service: 'schedule-miniapp' },
    serializers: { error: pino.stdSerializers.err, err: pino.stdSerializers.err },
  };

  if (process.env.NODE_ENV === 'development') {
    return {
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,service',
        },
      },
    };
  }
  return base;
}

let rootLogger: pino.Logger | undefined;

function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino(buildOptions());
  }
  return rootLogger;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getRootLogger().child({
    correlationId: getProcessCorrelationId(),
    ...context,
  });
}
