import type OpenAI from "openai";
import type { Logger } from "pino";
import type { Secrets } from "../config/env.js";
import type { ServerConfig } from "../schemas/server-config.js";
import { createVoiceBridge, type VoiceBridge } from "../voice/bridge.js";
import { createInputDeduplicator, type InputDeduplicator } from "../voice/dedup.js";
import { createGoogleVoiceProvider } from "../voice/google.js";
import { createOpenAiVoiceProvider } from "../voice/openai.js";
import type { VoiceProvider } from "../voice/types.js";

export interface VoiceServices {
  bridge: VoiceBridge;
  dedup: InputDeduplicator;
}

export interface CreateVoiceServicesOptions {
  config: ServerConfig;
  secrets: Secrets;
  openai: OpenAI;
  logger: Logger;
}

/**
 * OpenAI voice is always registered; Google only with GOOGLE_API_KEY.
 * Selecting an unregistered default provider fails startup.
 */
export function createVoiceServices(options: CreateVoiceServicesOptions): VoiceServices {
  const { config, secrets, openai, logger } = options;
  const timeoutMs = config.gateway.timeoutMs;

  const providers: VoiceProvider[] = [
    createOpenAiVoiceProvider({ client: openai, timeoutMs }),
  ];
  if (secrets.googleApiKey !== undefined) {
    providers.push(
      createGoogleVoiceProvider({ apiKey: secrets.googleApiKey, timeoutMs }),
    );
  } else {
    logger.warn("GOOGLE_API_KEY not set; google voice provider unavailable");
  }

  const bridge = createVoiceBridge({
    providers,
    defaultProvider: config.voice.provider,
    logger,
  });
  logger.info(
    { providers: bridge.providerNames, defaultProvider: config.voice.provider },
    "Voice bridge ready",
  );

  return { bridge, dedup: createInputDeduplicator() };
}
