/**
 * Environment Configuration
 *
 * Resolves the server configuration once at startup from environment variables.
 * The result is frozen and handed to every route handler factory, so handlers
 * never read `process.env` themselves.
 *
 * Usage:
 *   const config = loadConfig();
 *   const app = createApp(config);
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { buildRsoUrls, type RsoUrls } from './rso-urls.js';

const DEFAULT_ACCOUNT_DATA_URL = 'https://americas.api.riotgames.com/riot/account/v1/accounts/me';
const DEFAULT_CHAMPION_DATA_URL = 'https://na1.api.riotgames.com/lol/platform/v3/champion-rotations';

const required = z.string({ required_error: 'is required' }).min(1, 'is required');

const envSchema = z
  .object({
    RSO_BASE_URL: required,
    RSO_CLIENT_ID: required,
    RSO_CLIENT_SECRET: required,
    APP_BASE_URL: required,
    APP_CALLBACK_PATH: required.refine((path) => path.startsWith('/'), 'must start with "/"'),
    CLIENT_ID: z.string().optional(),
    RESPONSE_TYPE: required,
    SCOPE: required,
    RGAPI_TOKEN: required,

    PORT: z.coerce.number().int().positive().default(3000),
    SERVER_HOST: z.string().min(1).default('0.0.0.0'),
    SERVER_TLS_CERT: z.string().min(1).optional(),
    SERVER_TLS_KEY: z.string().min(1).optional(),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    RGAPI_URL_ACCOUNT_DATA: z.string().url().default(DEFAULT_ACCOUNT_DATA_URL),
    RGAPI_URL_CHAMPION_DATA: z.string().url().default(DEFAULT_CHAMPION_DATA_URL),
    SESSION_SECRET: z.string().min(1).default('changeme'),
    TOKEN_HANDOFF: z.enum(['query', 'session']).default('query'),
    NODE_ENV: z.string().default('development'),
  })
  .superRefine((vars, ctx) => {
    if (vars.SERVER_TLS_CERT && !vars.SERVER_TLS_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SERVER_TLS_KEY'], message: 'is required when SERVER_TLS_CERT is set' });
    }
    if (vars.SERVER_TLS_KEY && !vars.SERVER_TLS_CERT) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SERVER_TLS_CERT'], message: 'is required when SERVER_TLS_KEY is set' });
    }
  });

export type TokenHandoff = 'query' | 'session';

export interface TlsFiles {
  /** Path to the PEM certificate chain */
  certPath: string;
  /** Path to the PEM private key */
  keyPath: string;
}

export interface AppConfig {
  port: number;
  /** Address the server binds to */
  host: string;
  /** Serve HTTPS from these files; plain HTTP when absent */
  tls?: TlsFiles;
  nodeEnv: string;
  /** Fixed timeout applied to every outbound HTTP call */
  httpTimeoutMs: number;
  rso: {
    baseUrl: string;
    clientId: string;
    clientSecret: string;
    responseType: string;
    scope: string;
  } & RsoUrls;
  app: {
    baseUrl: string;
    callbackPath: string;
    /** `CLIENT_ID` from the environment, kept for parity with the shared .env file */
    clientId?: string;
    sessionSecret: string;
    tokenHandoff: TokenHandoff;
  };
  api: {
    /** Static API token sent as X-Riot-Token */
    token: string;
    accountDataUrl: string;
    championDataUrl: string;
  };
}

/**
 * Load and validate configuration from the environment
 *
 * @param env - Environment variables (defaults to `process.env`)
 * @throws ConfigurationError listing every missing or invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    const names = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigurationError(`Invalid environment configuration: ${problems.join('; ')}`, names);
  }

  const vars = parsed.data;
  const urls = buildRsoUrls({
    rsoBaseUrl: vars.RSO_BASE_URL,
    appBaseUrl: vars.APP_BASE_URL,
    callbackPath: vars.APP_CALLBACK_PATH,
    clientId: vars.RSO_CLIENT_ID,
    responseType: vars.RESPONSE_TYPE,
    scope: vars.SCOPE,
  });

  const tls =
    vars.SERVER_TLS_CERT && vars.SERVER_TLS_KEY
      ? { certPath: vars.SERVER_TLS_CERT, keyPath: vars.SERVER_TLS_KEY }
      : undefined;

  const config: AppConfig = {
    port: vars.PORT,
    host: vars.SERVER_HOST,
    tls,
    nodeEnv: vars.NODE_ENV,
    httpTimeoutMs: vars.HTTP_TIMEOUT_MS,
    rso: {
      baseUrl: vars.RSO_BASE_URL,
      clientId: vars.RSO_CLIENT_ID,
      clientSecret: vars.RSO_CLIENT_SECRET,
      responseType: vars.RESPONSE_TYPE,
      scope: vars.SCOPE,
      ...urls,
    },
    app: {
      baseUrl: vars.APP_BASE_URL,
      callbackPath: vars.APP_CALLBACK_PATH,
      clientId: vars.CLIENT_ID,
      sessionSecret: vars.SESSION_SECRET,
      tokenHandoff: vars.TOKEN_HANDOFF,
    },
    api: {
      token: vars.RGAPI_TOKEN,
      accountDataUrl: vars.RGAPI_URL_ACCOUNT_DATA,
      championDataUrl: vars.RGAPI_URL_CHAMPION_DATA,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
