import * as cheerio from "cheerio";
import { errorMessage } from "../config";
import type { AnswerContext } from "../context";
import { answerGeneralQuestion } from "../llm";
import { withWebpageExcerpt } from "../prompt";

export const NO_URL = "No URL found in the question.";

const EXCERPT_CHARS = 5000;
const URL_PATTERN = /https?:\/\/\S+/i;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"]+$/;

export function extractUrl(question: string): string | null {
  const match = URL_PATTERN.exec(question);
  if (!match) return null;
  return match[0].replace(TRAILING_PUNCTUATION, "");
}

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, noscript, template").remove();
  return $.root().text().replace(/\s+/g, " ").trim();
}

// Error pages are read like any other page; only network and parse failures are errors.
async function fetchPageText(url: string, ctx: AnswerContext): Promise<string> {
  const response = await ctx.fetch(url, { method: "GET" });
  if (!response.ok) {
    console.warn(`[Webpage] ${url} answered ${response.status}`);
  }
  return htmlToText(await response.text());
}

export async function answerWebpageQuestion(question: string, ctx: AnswerContext): Promise<string> {
  const url = extractUrl(question);
  if (!url) {
    return NO_URL;
  }

  let excerpt: string;
  try {
    excerpt = (await fetchPageText(url, ctx)).slice(0, EXCERPT_CHARS);
  } catch (error) {
    console.error(`[Webpage] ${url}: ${errorMessage(error)}`);
    return `Error processing webpage: ${errorMessage(error)}`;
  }

  return answerGeneralQuestion(withWebpageExcerpt(question, excerpt), ctx);
}
