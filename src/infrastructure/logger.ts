import pino from 'pino';

export const logger = pino({
  name: 'tariff-tracker',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createUserLogger(userId: string, module?: string) {
  return logger.child({
    userId,
    ...(module !== undefined && { module }),
  });
}
