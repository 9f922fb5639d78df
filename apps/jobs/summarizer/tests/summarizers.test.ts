import OpenAI from "openai";
import { afterEach, describe, it, expect, vi } from "vitest";
import { loadConfig } from "../src/config";
import { BackendUnavailableError, ConfigError } from "../src/errors";
import {
  BasicSummarizer,
  OllamaSummarizer,
  OpenAISummarizer,
  buildSummarizer,
} from "../src/summarizers";
import { ARTICLE_SUMMARY_DEFAULTS } from "../src/summarizers/enhanced";
import { stalledFetch } from "./fixtures";

const article = { url: "https://example.com/a", text: "Some article text.", extracted: true };

const MODEL_REPLY = [
  "ARTICLE SUMMARY:",
  "- A",
  "- B",
  "- C",
  "KEY POINTS:",
  "- K1",
  "- K2",
  "- K3",
].join("\n");

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function requestBody(init: unknown): unknown {
  if (init && typeof init === "object" && "body" in init && typeof init.body === "string") {
    return JSON.parse(init.body);
  }
  return undefined;
}

describe("OllamaSummarizer", () => {
  const config = { baseUrl: "http://localhost:11434", model: "mistral:7b", timeoutMs: 1000 };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a non-streaming generate request and parses the reply", async () => {
    const fetchMock = vi.fn(async (_url: unknown, _init?: unknown) =>
      jsonResponse({ model: "mistral:7b", response: `  ${MODEL_REPLY}\n`, done: true })
    );
    vi.stubGlobal("fetch", fetchMock);

    const summary = await new OllamaSummarizer(config).summarize(article, []);

    expect(summary.articleSummary).toEqual({ value: ["A", "B", "C"], usedDefault: false });
    expect(summary.keyPoints).toEqual({ value: ["K1", "K2", "K3"], usedDefault: false });
    expect(summary.commentSummary).toEqual({ value: [], usedDefault: false });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:11434/api/generate");
    expect(requestBody(init)).toMatchObject({ model: "mistral:7b", stream: false });
  });

  it("raises BackendUnavailableError on a non-2xx status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("boom", { status: 500, statusText: "Internal Server Error" }))
    );

    const failure = new OllamaSummarizer(config).summarize(article, []);
    await expect(failure).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(failure).rejects.toThrow("Ollama API error: 500 Internal Server Error");
  });

  it("raises BackendUnavailableError when the server is unreachable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(new OllamaSummarizer(config).summarize(article, [])).rejects.toThrow(
      "Ollama request failed: fetch failed"
    );
  });

  it("raises BackendUnavailableError when the reply body stalls", async () => {
    vi.stubGlobal("fetch", stalledFetch("application/json", '{"response":"ARTICLE'));

    const failure = new OllamaSummarizer({ ...config, timeoutMs: 50 }).summarize(article, []);
    await expect(failure).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(failure).rejects.toThrow(/^Ollama request failed: /);
  });

  it("falls back to defaults when the body is not JSON", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("oops", { status: 200 })));

    const summary = await new OllamaSummarizer(config).summarize(article, []);
    expect(summary.articleSummary).toEqual({ value: ARTICLE_SUMMARY_DEFAULTS, usedDefault: true });
  });
});

describe("OpenAISummarizer", () => {
  function summarizerWith(fetchMock: (url: unknown, init?: unknown) => Promise<Response>) {
    const client = new OpenAI({ apiKey: "test-key", maxRetries: 0, fetch: fetchMock });
    return new OpenAISummarizer({ client, model: "gpt-4o-mini", maxTokens: 1000, temperature: 0.7 });
  }

  it("sends the prompt as a chat completion and parses the reply", async () => {
    const fetchMock = vi.fn(async (_url: unknown, _init?: unknown) =>
      jsonResponse({
        id: "chatcmpl-test",
        object: "chat.completion",
        created: 0,
        model: "gpt-4o-mini",
        choices: [
          { index: 0, message: { role: "assistant", content: MODEL_REPLY }, finish_reason: "stop" },
        ],
        usage: { prompt_tokens: 10, completion_tokens: 20, total_tokens: 30 },
      })
    );

    const summary = await summarizerWith(fetchMock).summarize(article, ["Nice write-up"]);

    expect(summary.articleSummary.value).toEqual(["A", "B", "C"]);
    expect(summary.keyPoints.value).toEqual(["K1", "K2", "K3"]);
    expect(summary.commentSummary.usedDefault).toBe(true);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestBody(fetchMock.mock.calls[0][1])).toMatchObject({
      model: "gpt-4o-mini",
      max_tokens: 1000,
      temperature: 0.7,
    });
  });

  it("raises BackendUnavailableError on an API error", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({ error: { message: "overloaded", type: "server_error" } }, 503)
    );

    const failure = summarizerWith(fetchMock).summarize(article, []);
    await expect(failure).rejects.toBeInstanceOf(BackendUnavailableError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("buildSummarizer", () => {
  it("builds the basic summarizer by default", () => {
    expect(buildSummarizer(loadConfig({}))).toBeInstanceOf(BasicSummarizer);
  });

  it("builds the local model summarizer", () => {
    const summarizer = buildSummarizer(loadConfig({ SUMMARIZER_MODE: "local-model" }));
    expect(summarizer).toBeInstanceOf(OllamaSummarizer);
    expect(summarizer.needsComments).toBe(true);
  });

  it("builds the cloud model summarizer when a key is present", () => {
    const summarizer = buildSummarizer(
      loadConfig({ SUMMARIZER_MODE: "cloud-model", OPENAI_API_KEY: "test-key" })
    );
    expect(summarizer).toBeInstanceOf(OpenAISummarizer);
    expect(summarizer.mode).toBe("cloud-model");
  });

  it("requires an API key for cloud mode", () => {
    const config = loadConfig({ SUMMARIZER_MODE: "cloud-model" });
    expect(() => buildSummarizer(config)).toThrow(ConfigError);
    expect(() => buildSummarizer(config)).toThrow(
      "Missing OPENAI_API_KEY (required for cloud-model mode)"
    );
  });
});
