import { errorMessage } from "../config";
import type { AnswerContext } from "../context";
import { answerGeneralQuestion } from "../llm";
import { withVideoInfo } from "../prompt";
import type { VideoInfo } from "../types";

export const NO_YOUTUBE_URL = "No YouTube URL found in the question.";

const YOUTUBE_URL_PATTERN = /https?:\/\/(?:www\.)?(?:youtube\.com\/watch\?v=|youtu\.be\/)[\w-]+/;

export function extractYoutubeUrl(question: string): string | null {
  return YOUTUBE_URL_PATTERN.exec(question)?.[0] ?? null;
}

export async function answerYoutubeQuestion(question: string, ctx: AnswerContext): Promise<string> {
  const videoUrl = extractYoutubeUrl(question);
  if (!videoUrl) {
    return NO_YOUTUBE_URL;
  }

  let info: VideoInfo;
  try {
    info = await ctx.videos.getVideoInfo(videoUrl);
  } catch (error) {
    return `Error processing YouTube video: ${errorMessage(error)}`;
  }

  console.log(`[YouTube] ${videoUrl} -> ${JSON.stringify(info.title)}`);
  return answerGeneralQuestion(withVideoInfo(question, info.title, info.description), ctx);
}
