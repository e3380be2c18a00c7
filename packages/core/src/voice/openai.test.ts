import { describe, it, expect, vi, beforeEach } from "vitest";
import OpenAI from "openai";
import { ValidationError } from "../errors/catalog.js";
import {
  audioFilename,
  createOpenAiVoiceProvider,
  resolveOpenAiVoice,
  toWhisperLanguage,
} from "./openai.js";
import type { VoiceProvider } from "./types.js";

const BASE_URL = "https://openai.test/v1";

describe("OpenAI voice provider", () => {
  let fetchMock: ReturnType<typeof vi.fn<typeof fetch>>;
  let provider: VoiceProvider;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    provider = createOpenAiVoiceProvider({
      client: new OpenAI({
        apiKey: "test-key",
        baseURL: BASE_URL,
        fetch: fetchMock,
        maxRetries: 0,
      }),
      timeoutMs: 5_000,
    });
  });

  it("works on raw audio", () => {
    expect(provider.name).toBe("openai");
    expect(provider.requiresPcm).toBe(false);
  });

  it("transcribes with whisper-1 and the mapped language", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ text: " 專案進度如何 " }), {
        status: 200,
        headers: { "content-type": "application/json" },
      }),
    );

    const text = await provider.transcribe(new Uint8Array([1, 2, 3]), "cmn-Hant-TW");

    expect(text).toBe("專案進度如何");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe(`${BASE_URL}/audio/transcriptions`);
    expect(init?.body).toBeInstanceOf(FormData);
    if (init?.body instanceof FormData) {
      expect(init.body.get("model")).toBe("whisper-1");
      expect(init.body.get("language")).toBe("zh");
    }
  });

  it("returns null for an empty transcript", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ text: "" }), {
        status: 200,
        headers: { "content-type": "application/json" },
      }),
    );

    await expect(provider.transcribe(new Uint8Array([1]), "en-US")).resolves.toBeNull();
  });

  it("synthesizes MP3 with tts-1 and the requested voice", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(new Uint8Array([0xff, 0xfb, 0x90]), {
        status: 200,
        headers: { "content-type": "audio/mpeg" },
      }),
    );

    const audio = await provider.synthesize("Hello", "en-US", "nova");

    expect(audio).toEqual(new Uint8Array([0xff, 0xfb, 0x90]));
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe(`${BASE_URL}/audio/speech`);
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "tts-1",
      voice: "nova",
      input: "Hello",
      response_format: "mp3",
    });
  });

  it("rejects unknown voices before calling the API", async () => {
    await expect(provider.synthesize("Hello", "en-US", "robot")).rejects.toThrow(
      ValidationError,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps API failures onto GatewayError kinds", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ error: { message: "bad key" } }), {
        status: 401,
        headers: { "content-type": "application/json" },
      }),
    );

    await expect(provider.transcribe(new Uint8Array([1]), "en-US")).rejects.toMatchObject({
      kind: "auth",
    });
  });
});

describe("toWhisperLanguage", () => {
  it.each([
    ["cmn-Hant-TW", "zh"],
    ["zh-TW", "zh"],
    ["en-US", "en"],
    ["JA", "ja"],
    ["yue-HK", undefined],
    ["", undefined],
  ])("maps %s to %s", (tag, expected) => {
    expect(toWhisperLanguage(tag)).toBe(expected);
  });
});

describe("resolveOpenAiVoice", () => {
  it("defaults to alloy and accepts known voices case-insensitively", () => {
    expect(resolveOpenAiVoice(null)).toBe("alloy");
    expect(resolveOpenAiVoice("Shimmer")).toBe("shimmer");
  });
});

describe("audioFilename", () => {
  const ascii = (s: string) => new TextEncoder().encode(s);

  it("picks the extension from the container signature", () => {
    expect(audioFilename(ascii("RIFF\0\0\0\0WAVEfmt "))).toBe("audio.wav");
    expect(audioFilename(ascii("OggS\0\0"))).toBe("audio.ogg");
    expect(audioFilename(ascii("ID3\x04"))).toBe("audio.mp3");
    expect(audioFilename(new Uint8Array([0x1a, 0x45, 0xdf, 0xa3, 0x01]))).toBe("audio.webm");
    expect(audioFilename(new Uint8Array([1, 2, 3, 4]))).toBe("audio.wav");
  });
});
