import winston from 'winston';
import WinstonCloudWatch from 'winston-cloudwatch';

interface CloudWatchConfig {
  logGroupName: string;
  logStreamName: string;
  awsRegion: string;
  awsAccessKeyId: string | undefined;
  awsSecretKey: string | undefined;
}

export function cloudWatchConfig(env: NodeJS.ProcessEnv): CloudWatchConfig {
  return {
    logGroupName: env.CLOUDWATCH_LOG_GROUP || 'rso-sample-server',
    logStreamName: env.CLOUDWATCH_LOG_STREAM || 'domain-logging',
    awsRegion: env.AWS_REGION || 'us-east-1',
    awsAccessKeyId: env.AWS_ACCESS_KEY_ID,
    awsSecretKey: env.AWS_SECRET_ACCESS_KEY,
  };
}

export function buildTransports(env: NodeJS.ProcessEnv): winston.transport[] {
  const isTest = env.NODE_ENV === 'test' || env.JEST_WORKER_ID !== undefined;

  const transports: winston.transport[] = [
    new winston.transports.Console({
      silent: isTest,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} ${level}: ${message}${details}`;
        })
      ),
    }),
  ];

  if (env.AWS_ACCESS_KEY_ID) {
    transports.push(new WinstonCloudWatch(cloudWatchConfig(env)));
  }

  return transports;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports: buildTransports(process.env),
});
