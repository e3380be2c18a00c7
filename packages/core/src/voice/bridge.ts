import type { Logger } from "pino";
import {
  ConfigurationError,
  GatewayError,
  NotFoundError,
  UnsupportedAudioError,
} from "../errors/catalog.js";
import type { VoiceProviderName } from "../schemas/server-config.js";
import type { VoiceProvider } from "./types.js";
import { toLinear16 } from "./wav.js";

export interface TranscribeOptions {
  languageHint: string;
  /** Provider name; the bridge default when omitted. */
  provider?: string;
}

export interface SynthesizeOptions {
  languageHint: string;
  voiceName?: string | null;
  provider?: string;
}

export interface VoiceBridgeDeps {
  providers: VoiceProvider[];
  defaultProvider: VoiceProviderName;
  logger: Logger;
}

/**
 * Speech in and out for the chat flow. A failed or empty recognition is
 * `null` so the user can simply try again; a failed synthesis is `null` so
 * the text answer still goes out.
 */
export interface VoiceBridge {
  readonly providerNames: VoiceProviderName[];
  transcribe(audio: Uint8Array, options: TranscribeOptions): Promise<string | null>;
  synthesize(text: string, options: SynthesizeOptions): Promise<Uint8Array | null>;
}

function isDegradable(err: unknown): boolean {
  return err instanceof GatewayError || err instanceof UnsupportedAudioError;
}

export function createVoiceBridge(deps: VoiceBridgeDeps): VoiceBridge {
  const { logger } = deps;
  const byName = new Map<string, VoiceProvider>();
  for (const provider of deps.providers) {
    byName.set(provider.name, provider);
  }
  if (!byName.has(deps.defaultProvider)) {
    throw new ConfigurationError(
      `Default voice provider "${deps.defaultProvider}" is not available`,
      { provider: deps.defaultProvider, available: [...byName.keys()] },
    );
  }

  function select(name: string | undefined): VoiceProvider {
    const provider = byName.get(name ?? deps.defaultProvider);
    if (!provider) {
      throw new NotFoundError(`Voice provider not available: ${name}`, {
        provider: name,
        available: [...byName.keys()],
      });
    }
    return provider;
  }

  return {
    providerNames: deps.providers.map((p) => p.name),

    async transcribe(audio, options) {
      const provider = select(options.provider);
      if (audio.byteLength === 0) return null;

      try {
        const input = provider.requiresPcm ? toLinear16(audio) : audio;
        const text = await provider.transcribe(input, options.languageHint);
        if (text === null || text.trim().length === 0) {
          logger.warn({ provider: provider.name }, "No speech recognised");
          return null;
        }
        return text.trim();
      } catch (err) {
        if (!isDegradable(err)) throw err;
        logger.warn({ err, provider: provider.name }, "Transcription failed");
        return null;
      }
    },

    async synthesize(text, options) {
      const provider = select(options.provider);
      if (text.trim().length === 0) return null;

      try {
        const audio = await provider.synthesize(
          text,
          options.languageHint,
          options.voiceName ?? null,
        );
        if (audio.byteLength === 0) {
          logger.warn({ provider: provider.name }, "Synthesis returned no audio");
          return null;
        }
        return audio;
      } catch (err) {
        if (!isDegradable(err)) throw err;
        logger.warn({ err, provider: provider.name }, "Synthesis failed");
        return null;
      }
    },
  };
}
