import OpenAI, { toFile } from "openai";
import { ValidationError } from "../errors/catalog.js";
import { classifyOpenAiError } from "../gateway/openai.js";
import { withTimeout } from "../gateway/timeout.js";
import type { VoiceProvider } from "./types.js";
import { isWav } from "./wav.js";

/** Voices `tts-1` accepts. */
export const OPENAI_VOICES = [
  "alloy",
  "ash",
  "coral",
  "echo",
  "fable",
  "onyx",
  "nova",
  "sage",
  "shimmer",
] as const;

export type OpenAiVoice = (typeof OPENAI_VOICES)[number];

export const DEFAULT_OPENAI_VOICE: OpenAiVoice = "alloy";

export interface OpenAiVoiceProviderOptions {
  client: OpenAI;
  timeoutMs: number;
}

/** BCP-47 tag to the ISO-639-1 code Whisper takes ("cmn-Hant-TW" → "zh"). */
export function toWhisperLanguage(languageHint: string): string | undefined {
  const primary = languageHint.split(/[-_]/)[0]?.toLowerCase() ?? "";
  if (primary === "cmn" || primary === "zh") return "zh";
  return /^[a-z]{2}$/.test(primary) ? primary : undefined;
}

export function resolveOpenAiVoice(voiceName: string | null): OpenAiVoice {
  if (voiceName === null) return DEFAULT_OPENAI_VOICE;
  const voice = OPENAI_VOICES.find((v) => v === voiceName.toLowerCase());
  if (!voice) {
    throw new ValidationError(`Unknown OpenAI voice: ${voiceName}`, {
      voice: voiceName,
      allowed: [...OPENAI_VOICES],
    });
  }
  return voice;
}

/** Filename whose extension lets Whisper detect the container. */
export function audioFilename(audio: Uint8Array): string {
  if (isWav(audio)) return "audio.wav";
  const head = String.fromCharCode(...audio.subarray(0, 4));
  if (head === "OggS") return "audio.ogg";
  if (head === "fLaC") return "audio.flac";
  if (head.startsWith("ID3") || (audio[0] === 0xff && ((audio[1] ?? 0) & 0xe0) === 0xe0)) {
    return "audio.mp3";
  }
  if (audio[0] === 0x1a && audio[1] === 0x45 && audio[2] === 0xdf && audio[3] === 0xa3) {
    return "audio.webm";
  }
  return "audio.wav";
}

export function createOpenAiVoiceProvider(
  options: OpenAiVoiceProviderOptions,
): VoiceProvider {
  const { client, timeoutMs } = options;

  return {
    name: "openai",
    requiresPcm: false,

    async transcribe(audio, languageHint) {
      const language = toWhisperLanguage(languageHint);
      const result = await withTimeout(
        "transcribe",
        timeoutMs,
        async (signal) =>
          client.audio.transcriptions.create(
            {
              model: "whisper-1",
              file: await toFile(audio, audioFilename(audio)),
              ...(language !== undefined && { language }),
            },
            { signal, timeout: timeoutMs, maxRetries: 0 },
          ),
        classifyOpenAiError,
      );
      const text = result.text.trim();
      return text.length > 0 ? text : null;
    },

    async synthesize(text, _languageHint, voiceName) {
      const voice = resolveOpenAiVoice(voiceName);
      return withTimeout(
        "synthesize",
        timeoutMs,
        async (signal) => {
          const response = await client.audio.speech.create(
            { model: "tts-1", voice, input: text, response_format: "mp3" },
            { signal, timeout: timeoutMs, maxRetries: 0 },
          );
          return new Uint8Array(await response.arrayBuffer());
        },
        classifyOpenAiError,
      );
    },
  };
}
