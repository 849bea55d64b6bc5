import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'vinfast-telemetry-bridge' },
  redact: {
    paths: [
      'password',
      'email',
      'accessToken',
      'refreshToken',
      'access_token',
      'refresh_token',
      '*.password',
      '*.accessToken',
      '*.refreshToken',
      'headers.authorization',
    ],
    censor: '[redacted]',
  },
});
