export type { VoiceProvider } from "./types.js";
export {
  createVoiceBridge,
  type VoiceBridge,
  type VoiceBridgeDeps,
  type TranscribeOptions,
  type SynthesizeOptions,
} from "./bridge.js";
export {
  createInputDeduplicator,
  type InputDeduplicator,
  type InputDeduplicatorOptions,
} from "./dedup.js";
export {
  createOpenAiVoiceProvider,
  resolveOpenAiVoice,
  toWhisperLanguage,
  OPENAI_VOICES,
  DEFAULT_OPENAI_VOICE,
  type OpenAiVoice,
  type OpenAiVoiceProviderOptions,
} from "./openai.js";
export {
  createGoogleVoiceProvider,
  GOOGLE_SPEECH_URL,
  GOOGLE_TTS_URL,
  type GoogleVoiceProviderOptions,
} from "./google.js";
export { decodeWav, isWav, toLinear16, TARGET_SAMPLE_RATE } from "./wav.js";
