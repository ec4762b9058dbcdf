import { describe, expect, it, vi } from "vitest";
import { answerGeneralQuestion, MISSING_KEY_ANSWER } from "./llm";
import { SYSTEM_PROMPT } from "./prompt";
import { completionResponse, requestBody, testContext } from "./testing";

describe("answerGeneralQuestion", () => {
  it("returns the fixed message without calling the API when no key is configured", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    const ctx = testContext(fetchMock, { config: { openaiApiKey: undefined } });

    await expect(answerGeneralQuestion("What is 2 + 2?", ctx)).resolves.toBe(MISSING_KEY_ANSWER);
    expect(MISSING_KEY_ANSWER).toBe(
      "API key not configured. Please set the OPENAI_API_KEY environment variable.",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("sends the system instruction, question and token cap and trims the reply", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(completionResponse("  42 \n"));
    const ctx = testContext(fetchMock);

    await expect(answerGeneralQuestion("What is 6 * 7?", ctx)).resolves.toBe("42");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret-key" });
    expect(requestBody(init)).toEqual({
      model: "gpt-3.5-turbo",
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: "What is 6 * 7?" },
      ],
      max_tokens: 150,
    });
  });

  it("adds the project header when a project is configured", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(completionResponse("ok"));
    const ctx = testContext(fetchMock, { config: { openaiProject: "proj_test" } });

    await answerGeneralQuestion("hello", ctx);

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.headers).toMatchObject({ "OpenAI-Project": "proj_test" });
  });

  it("reports non-2xx responses as an answer string", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response("upstream broke", { status: 500 }));

    await expect(answerGeneralQuestion("hello", testContext(fetchMock))).resolves.toBe(
      "Error using OpenAI API: OpenAI request failed with status 500",
    );
  });

  it("explains an exhausted quota", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('{"error":{"code":"insufficient_quota"}}', { status: 429 }));

    await expect(answerGeneralQuestion("hello", testContext(fetchMock))).resolves.toBe(
      "Error using OpenAI API: OpenAI quota exceeded. Billing or quota must be increased before answers can be generated.",
    );
  });

  it("reports network failures and empty replies", async () => {
    const offline = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));
    await expect(answerGeneralQuestion("hello", testContext(offline))).resolves.toBe(
      "Error using OpenAI API: fetch failed",
    );

    const empty = vi.fn<typeof fetch>().mockResolvedValue(completionResponse("   "));
    await expect(answerGeneralQuestion("hello", testContext(empty))).resolves.toBe(
      "Error using OpenAI API: OpenAI returned an empty response",
    );
  });
});
