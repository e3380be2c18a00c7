import { z } from "zod";
import { ConfigurationError } from "../errors/catalog.js";
import {
  LogLevel,
  ServerConfigSchema,
  VoiceProviderName,
  type ServerConfig,
} from "../schemas/server-config.js";

type Env = Record<string, string | undefined>;

const EnvOverridesSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  OPENAI_MODEL: z.string().optional(),
  DOCQA_DB_PATH: z.string().optional(),
  VOICE_PROVIDER: VoiceProviderName.optional(),
  LOG_LEVEL: LogLevel.optional(),
});

const SecretsSchema = z.object({
  OPENAI_API_KEY: z.string({ error: "required" }),
  OPENAI_BASE_URL: z.url().optional(),
  GOOGLE_API_KEY: z.string().optional(),
});

export interface Secrets {
  openaiApiKey: string;
  openaiBaseUrl?: string;
  googleApiKey?: string;
}

/** Unset and blank variables are treated the same. */
function present(env: Env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      out[key] = value.trim();
    }
  }
  return out;
}

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const issue = error.issues[0];
  const variable = issue?.path.map(String).join(".") ?? "environment";
  return new ConfigurationError(
    `Invalid environment: ${variable}: ${issue?.message ?? "invalid value"}`,
    { variable },
  );
}

/**
 * Applies process environment overrides on top of the file configuration.
 * The result is re-validated so an override cannot produce an invalid config.
 */
export function applyEnvOverrides(
  config: ServerConfig,
  env: Env = process.env,
): ServerConfig {
  const parsed = EnvOverridesSchema.safeParse(present(env));
  if (!parsed.success) {
    throw toConfigurationError(parsed.error);
  }
  const vars = parsed.data;

  return ServerConfigSchema.parse({
    ...config,
    server: { ...config.server, port: vars.PORT ?? config.server.port },
    logging: { ...config.logging, level: vars.LOG_LEVEL ?? config.logging.level },
    catalog: { path: vars.DOCQA_DB_PATH ?? config.catalog.path },
    gateway: { ...config.gateway, model: vars.OPENAI_MODEL ?? config.gateway.model },
    voice: {
      ...config.voice,
      provider: vars.VOICE_PROVIDER ?? config.voice.provider,
    },
  });
}

/**
 * Reads secrets from the environment. A missing answering-platform key is
 * fatal: the process must not start without it.
 */
export function loadSecrets(env: Env = process.env): Secrets {
  const parsed = SecretsSchema.safeParse(present(env));
  if (!parsed.success) {
    throw toConfigurationError(parsed.error);
  }
  return {
    openaiApiKey: parsed.data.OPENAI_API_KEY,
    ...(parsed.data.OPENAI_BASE_URL !== undefined && {
      openaiBaseUrl: parsed.data.OPENAI_BASE_URL,
    }),
    ...(parsed.data.GOOGLE_API_KEY !== undefined && {
      googleApiKey: parsed.data.GOOGLE_API_KEY,
    }),
  };
}
