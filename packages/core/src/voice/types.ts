import type { VoiceProviderName } from "../schemas/server-config.js";

/**
 * Speech capability behind the voice bridge. Implementations throw
 * `GatewayError` for provider failures; the bridge decides what to surface.
 */
export interface VoiceProvider {
  readonly name: VoiceProviderName;
  /** Whether audio must be converted to mono 16 kHz LINEAR16 first. */
  readonly requiresPcm: boolean;
  /** Best transcript, or null when no speech was recognised. */
  transcribe(audio: Uint8Array, languageHint: string): Promise<string | null>;
  /** Encoded audio (MP3). */
  synthesize(
    text: string,
    languageHint: string,
    voiceName: string | null,
  ): Promise<Uint8Array>;
}
