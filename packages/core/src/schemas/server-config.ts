import { z } from "zod";

export const DEFAULTS = {
  server: {
    port: 8080,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  catalog: {
    path: null,
  },
  gateway: {
    model: "gpt-4.1-mini",
    timeoutMs: 60_000,
    listCap: 200,
  },
  answering: {
    language: "Traditional Chinese",
    notProvidedSignal: "文件未提供",
  },
  voice: {
    provider: "openai" as const,
    recognitionLanguage: "cmn-Hant-TW",
    synthesisLanguage: "zh-TW",
    voiceName: null,
  },
  upload: {
    maxBytes: 50 * 1024 * 1024,
  },
};

export const VoiceProviderName = z.enum(["openai", "google"]);
export type VoiceProviderName = z.infer<typeof VoiceProviderName>;

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: LogLevel.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  catalog: z
    .object({
      path: z
        .string()
        .min(1)
        .nullable()
        .default(DEFAULTS.catalog.path)
        .describe("SQLite file; null means <root>/catalog.db"),
    })
    .default(DEFAULTS.catalog),
  gateway: z
    .object({
      model: z.string().min(1).default(DEFAULTS.gateway.model),
      timeoutMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.gateway.timeoutMs),
      listCap: z.number().int().positive().default(DEFAULTS.gateway.listCap),
    })
    .default(DEFAULTS.gateway),
  answering: z
    .object({
      language: z.string().min(1).default(DEFAULTS.answering.language),
      notProvidedSignal: z
        .string()
        .min(1)
        .default(DEFAULTS.answering.notProvidedSignal),
    })
    .default(DEFAULTS.answering),
  voice: z
    .object({
      provider: VoiceProviderName.default(DEFAULTS.voice.provider),
      recognitionLanguage: z
        .string()
        .min(1)
        .default(DEFAULTS.voice.recognitionLanguage),
      synthesisLanguage: z
        .string()
        .min(1)
        .default(DEFAULTS.voice.synthesisLanguage),
      voiceName: z.string().min(1).nullable().default(DEFAULTS.voice.voiceName),
    })
    .default(DEFAULTS.voice),
  upload: z
    .object({
      maxBytes: z.number().int().positive().default(DEFAULTS.upload.maxBytes),
    })
    .default(DEFAULTS.upload),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type GatewayConfig = ServerConfig["gateway"];
export type AnsweringConfig = ServerConfig["answering"];
export type VoiceConfig = ServerConfig["voice"];
