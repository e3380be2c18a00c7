import { Hono } from "hono";
import { z } from "zod";
import type { Logger } from "pino";
import type { VoiceServices } from "@docqa/core/services";
import type { VoiceConfig } from "@docqa/core/schemas";
import { ValidationError } from "@docqa/core/errors";
import { createBodyLimit, DEFAULT_MAX_SIZE } from "../middleware/body-limit.js";
import { formFile, formText, readForm, readJson } from "./request.js";

export interface VoiceRouteDeps extends VoiceServices {
  defaults: Pick<VoiceConfig, "recognitionLanguage" | "synthesisLanguage" | "voiceName">;
  logger: Logger;
  uploadMaxBytes: number;
}

const SynthesizeBodySchema = z.object({
  text: z.string(),
  language: z.string().min(1).optional(),
  voice: z.string().min(1).optional(),
  provider: z.string().min(1).optional(),
});

export function voiceRoutes(deps: VoiceRouteDeps): Hono {
  const app = new Hono();

  // POST /transcribe: multipart `audio` + `session_id`; null text on failure
  app.post("/transcribe", createBodyLimit(deps.uploadMaxBytes), async (c) => {
    const form = await readForm(c);
    const audio = await formFile(form, "audio");
    const sessionId = formText(form, "session_id");
    if (sessionId === undefined) {
      throw new ValidationError("Missing field: session_id", { field: "session_id" });
    }

    if (deps.dedup.isDuplicate(sessionId, audio.bytes)) {
      deps.logger.info({ sessionId }, "Repeated audio ignored");
      return c.json({ text: null, duplicate: true });
    }

    const text = await deps.bridge.transcribe(audio.bytes, {
      languageHint: formText(form, "language") ?? deps.defaults.recognitionLanguage,
      provider: formText(form, "provider"),
    });
    if (text !== null) {
      deps.dedup.markProcessed(sessionId, audio.bytes);
    }
    return c.json({ text, duplicate: false });
  });

  // POST /synthesize: MP3 bytes, or 204 when no audio could be produced
  app.post("/synthesize", createBodyLimit(DEFAULT_MAX_SIZE), async (c) => {
    const body = await readJson(c, SynthesizeBodySchema);
    const audio = await deps.bridge.synthesize(body.text, {
      languageHint: body.language ?? deps.defaults.synthesisLanguage,
      voiceName: body.voice ?? deps.defaults.voiceName,
      provider: body.provider,
    });
    if (audio === null) {
      return c.body(null, 204);
    }

    const out = new ArrayBuffer(audio.byteLength);
    new Uint8Array(out).set(audio);
    return c.body(out, 200, { "Content-Type": "audio/mpeg" });
  });

  return app;
}
