import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL, type AppConfig } from "./config";
import type { AnswerContext } from "./context";
import type { VideoMetadataClient } from "./youtube";

// Shared fixtures for the *.test.ts files.

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    openaiApiKey: "test-secret-key",
    openaiModel: DEFAULT_MODEL,
    maxTokens: DEFAULT_MAX_TOKENS,
    maxUploadBytes: 1024 * 1024,
    ...overrides,
  };
}

const unusedVideos: VideoMetadataClient = {
  getVideoInfo: () => Promise.reject(new Error("video lookup not expected in this test")),
};

export function testContext(
  fetchImpl: typeof fetch,
  overrides: { config?: Partial<AppConfig>; videos?: VideoMetadataClient } = {},
): AnswerContext {
  return {
    config: testConfig(overrides.config),
    fetch: fetchImpl,
    videos: overrides.videos ?? unusedVideos,
  };
}

export function completionResponse(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: "assistant", content } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json", "x-request-id": "req_test" },
  });
}

/** Parses the JSON body of a captured fetch call. */
export function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(typeof init?.body === "string" ? init.body : "null");
}

/** The user message of a captured completion request. */
export function sentQuestion(init: RequestInit | undefined): string {
  const body = requestBody(init);
  if (!body || typeof body !== "object" || !("messages" in body) || !Array.isArray(body.messages)) {
    throw new Error("not a chat completion request");
  }
  const user: unknown = body.messages.find(
    (message: unknown) => typeof message === "object" && message !== null && "role" in message && message.role === "user",
  );
  if (!user || typeof user !== "object" || !("content" in user) || typeof user.content !== "string") {
    throw new Error("completion request has no user message");
  }
  return user.content;
}
