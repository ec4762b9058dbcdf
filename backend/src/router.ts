import { errorMessage } from "./config";
import type { AnswerContext } from "./context";
import { answerCsvQuestion } from "./handlers/csv";
import { answerPdfQuestion } from "./handlers/pdf";
import { answerWebpageQuestion } from "./handlers/webpage";
import { answerYoutubeQuestion } from "./handlers/youtube";
import { answerGeneralQuestion } from "./llm";
import type { HandlerKind, QuestionRequest } from "./types";

/**
 * First match wins. File checks only apply when a file is attached, and the YouTube
 * check runs before the generic URL check so video links never reach the page fetcher.
 */
export function classifyQuestion(question: string, filePath?: string): HandlerKind {
  if (filePath && /\.(zip|csv)\b/i.test(question)) return "csv";
  if (filePath && /\.pdf\b/i.test(question)) return "pdf";
  if (/youtube\.com|youtu\.be/i.test(question)) return "youtube";
  if (/https?:\/\/\S+/i.test(question)) return "webpage";
  return "general";
}

async function dispatch(kind: HandlerKind, { question, filePath }: QuestionRequest, ctx: AnswerContext): Promise<string> {
  switch (kind) {
    case "csv":
      return filePath ? answerCsvQuestion(question, filePath, ctx) : answerGeneralQuestion(question, ctx);
    case "pdf":
      return answerPdfQuestion();
    case "youtube":
      return answerYoutubeQuestion(question, ctx);
    case "webpage":
      return answerWebpageQuestion(question, ctx);
    case "general":
      return answerGeneralQuestion(question, ctx);
  }
}

export async function answerQuestion(request: QuestionRequest, ctx: AnswerContext): Promise<string> {
  const kind = classifyQuestion(request.question, request.filePath);
  console.log(`[Router] ${kind}`);

  try {
    return await dispatch(kind, request, ctx);
  } catch (error) {
    console.error(`[Router] ${kind} handler failed: ${errorMessage(error)}`);
    return `Error processing question: ${errorMessage(error)}`;
  }
}
