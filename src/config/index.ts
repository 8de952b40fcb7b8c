import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const DEV_SESSION_SECRET = 'dev-session-secret';

const RawConfigSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    BUILD_VERSION: z.string().default('dev'),
    LOG_LEVEL: z.string().default('info'),
    REQUEST_BODY_LIMIT: z.string().default('1mb'),
    RPC_URL: z.string().startsWith('/').default('/RPC2'),
    RPC_SERVICE_TYPE: z.string().default('JSONRPC 1.0 dispatcher'),
    RPC_LOG_REQUESTS_RESPONSES: booleanFlag('true'),
    RPC_RESTRICT_INTROSPECTION: booleanFlag('false'),
    RPC_RESTRICT_OOTB_AUTH: booleanFlag('true'),
    RPC_RESTRICT_METHOD_SUMMARY: booleanFlag('false'),
    RPC_HTTP_ACCESS_CREDENTIALS: booleanFlag('false'),
    RPC_HTTP_ACCESS_ALLOW_ORIGIN: z.string().default(''),
    RPC_SESSION_SECRET: z.string().min(1).optional(),
    RPC_SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
    RPC_USERS_FILE: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && (!env.RPC_SESSION_SECRET || env.RPC_SESSION_SECRET === DEV_SESSION_SECRET)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RPC_SESSION_SECRET'],
        message: 'RPC_SESSION_SECRET must be set to a non-default value in production',
      });
    }
  });

export type AppConfig = ReturnType<typeof buildConfig>;

export function buildConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = RawConfigSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    buildVersion: parsed.BUILD_VERSION,
    serverName: 'jsonrpc-dispatch',
    logging: {
      level: parsed.LOG_LEVEL,
      requestsResponses: parsed.RPC_LOG_REQUESTS_RESPONSES,
    },
    http: {
      bodyLimit: parsed.REQUEST_BODY_LIMIT,
      accessCredentials: parsed.RPC_HTTP_ACCESS_CREDENTIALS,
      accessAllowOrigin: parsed.RPC_HTTP_ACCESS_ALLOW_ORIGIN,
    },
    rpc: {
      url: sanitizePath(parsed.RPC_URL),
      serviceType: parsed.RPC_SERVICE_TYPE,
      restrictIntrospection: parsed.RPC_RESTRICT_INTROSPECTION,
      restrictOotbAuth: parsed.RPC_RESTRICT_OOTB_AUTH,
      restrictMethodSummary: parsed.RPC_RESTRICT_METHOD_SUMMARY,
    },
    auth: {
      sessionSecret: parsed.RPC_SESSION_SECRET ?? DEV_SESSION_SECRET,
      sessionTtlSeconds: parsed.RPC_SESSION_TTL_SECONDS,
      usersFile: parsed.RPC_USERS_FILE,
    },
  } as const;
}

function sanitizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed.length > 0 ? trimmed : '/';
}

export const config = buildConfig();
