import { errorMessage, keyFingerprint } from "./config";
import type { AnswerContext } from "./context";
import { SYSTEM_PROMPT } from "./prompt";

const COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

export const MISSING_KEY_ANSWER =
  "API key not configured. Please set the OPENAI_API_KEY environment variable.";

function extractCompletionText(data: unknown): string {
  if (!data || typeof data !== "object") {
    return "";
  }

  const top = data as {
    choices?: Array<{
      message?: { content?: string | null };
    }>;
  };

  const content = top.choices?.[0]?.message?.content;
  return typeof content === "string" ? content.trim() : "";
}

async function requestCompletion(question: string, apiKey: string, ctx: AnswerContext): Promise<string> {
  const { openaiModel, openaiProject, maxTokens } = ctx.config;
  console.log(`[LLM] Calling OpenAI with model: ${openaiModel}`);
  console.log(`[LLM] Using key: ${keyFingerprint(apiKey)} project: ${openaiProject || "(default)"}`);

  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    "Content-Type": "application/json",
  };

  if (openaiProject) {
    headers["OpenAI-Project"] = openaiProject;
  }

  const response = await ctx.fetch(COMPLETIONS_URL, {
    method: "POST",
    headers,
    body: JSON.stringify({
      model: openaiModel,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: question },
      ],
      max_tokens: maxTokens,
    }),
  });

  const requestId = response.headers.get("x-request-id") || "(none)";

  if (!response.ok) {
    const errorBody = await response.text();
    console.error(`[LLM] OpenAI error ${response.status} request_id=${requestId}: ${errorBody}`);

    if (response.status === 429 && errorBody.includes("insufficient_quota")) {
      throw new Error("OpenAI quota exceeded. Billing or quota must be increased before answers can be generated.");
    }
    throw new Error(`OpenAI request failed with status ${response.status}`);
  }

  const data = (await response.json()) as unknown;
  console.log(`[LLM] OpenAI request succeeded. request_id=${requestId}`);

  const text = extractCompletionText(data);
  if (!text) {
    throw new Error("OpenAI returned an empty response");
  }
  return text;
}

/**
 * General Answer Service. Every other handler ends here once it has appended its
 * context to the question. Resolves to an answer string in all cases.
 */
export async function answerGeneralQuestion(question: string, ctx: AnswerContext): Promise<string> {
  const apiKey = ctx.config.openaiApiKey;
  if (!apiKey) {
    console.warn("[LLM] OPENAI_API_KEY is missing.");
    return MISSING_KEY_ANSWER;
  }

  try {
    return await requestCompletion(question, apiKey, ctx);
  } catch (error) {
    return `Error using OpenAI API: ${errorMessage(error)}`;
  }
}
