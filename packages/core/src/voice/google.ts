/**
 * Google Cloud Speech-to-Text and Text-to-Speech over their v1 REST
 * endpoints, authenticated with an API key.
 */

import { z } from "zod";
import { GatewayError, type GatewayErrorKind } from "../errors/catalog.js";
import { withTimeout } from "../gateway/timeout.js";
import { TARGET_SAMPLE_RATE } from "./wav.js";
import type { VoiceProvider } from "./types.js";

export const GOOGLE_SPEECH_URL = "https://speech.googleapis.com/v1/speech:recognize";
export const GOOGLE_TTS_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";

export interface GoogleVoiceProviderOptions {
  apiKey: string;
  timeoutMs: number;
  speechUrl?: string;
  ttsUrl?: string;
}

const RecognizeResponseSchema = z.object({
  results: z
    .array(
      z.object({
        alternatives: z
          .array(z.object({ transcript: z.string().optional() }))
          .optional(),
      }),
    )
    .optional(),
});

const SynthesizeResponseSchema = z.object({
  audioContent: z.string().min(1),
});

function kindForStatus(status: number): GatewayErrorKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 404) return "not_found";
  if (status === 429) return "rate_limit";
  return "provider";
}

function classifyFetchError(err: unknown, operation: string): GatewayError {
  const detail = err instanceof Error ? err.message : String(err);
  return new GatewayError("network", `${operation} failed: ${detail}`, {
    cause: err,
    details: { operation },
  });
}

async function postJson(
  operation: string,
  url: string,
  apiKey: string,
  body: unknown,
  timeoutMs: number,
): Promise<unknown> {
  return withTimeout(
    operation,
    timeoutMs,
    async (signal) => {
      const res = await fetch(`${url}?key=${encodeURIComponent(apiKey)}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal,
      });
      if (!res.ok) {
        const text = await res.text();
        throw new GatewayError(
          kindForStatus(res.status),
          `${operation} failed: ${res.status} ${text}`,
          { details: { operation, status: res.status } },
        );
      }
      return res.json();
    },
    classifyFetchError,
  );
}

function parseResponse<T>(
  operation: string,
  schema: z.ZodType<T>,
  payload: unknown,
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new GatewayError(
      "malformed_response",
      `${operation} returned an unexpected body`,
      { details: { operation, issues: result.error.issues.map((i) => i.message) } },
    );
  }
  return result.data;
}

export function createGoogleVoiceProvider(
  options: GoogleVoiceProviderOptions,
): VoiceProvider {
  const { apiKey, timeoutMs } = options;
  const speechUrl = options.speechUrl ?? GOOGLE_SPEECH_URL;
  const ttsUrl = options.ttsUrl ?? GOOGLE_TTS_URL;

  return {
    name: "google",
    requiresPcm: true,

    async transcribe(pcm, languageHint) {
      const payload = await postJson(
        "transcribe",
        speechUrl,
        apiKey,
        {
          config: {
            encoding: "LINEAR16",
            sampleRateHertz: TARGET_SAMPLE_RATE,
            languageCode: languageHint,
            enableAutomaticPunctuation: true,
          },
          audio: { content: Buffer.from(pcm).toString("base64") },
        },
        timeoutMs,
      );
      const { results = [] } = parseResponse(
        "transcribe",
        RecognizeResponseSchema,
        payload,
      );
      const transcript = results
        .map((r) => r.alternatives?.[0]?.transcript ?? "")
        .filter((t) => t.length > 0)
        .join(" ")
        .trim();
      return transcript.length > 0 ? transcript : null;
    },

    async synthesize(text, languageHint, voiceName) {
      const payload = await postJson(
        "synthesize",
        ttsUrl,
        apiKey,
        {
          input: { text },
          voice: {
            languageCode: languageHint,
            ...(voiceName !== null && { name: voiceName }),
          },
          audioConfig: { audioEncoding: "MP3" },
        },
        timeoutMs,
      );
      const { audioContent } = parseResponse(
        "synthesize",
        SynthesizeResponseSchema,
        payload,
      );
      return new Uint8Array(Buffer.from(audioContent, "base64"));
    },
  };
}
