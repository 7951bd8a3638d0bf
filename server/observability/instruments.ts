import 'dotenv/config';
import * as Sentry from '@sentry/node';

interface SentryConfig {
  dsn: string | undefined;
  tracesSampleRate: number;
  enabled: boolean;
  environment: string | undefined;
}

const sentryConfig: SentryConfig = {
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
  enabled: !!process.env.SENTRY_DSN,
  environment: process.env.NODE_ENV,
};

Sentry.init(sentryConfig);
