import type { AppConfig } from "./config";
import { createVideoMetadataClient, type VideoMetadataClient } from "./youtube";

export type AnswerContext = {
  config: AppConfig;
  fetch: typeof fetch;
  videos: VideoMetadataClient;
};

export function createContext(config: AppConfig, fetchImpl: typeof fetch = fetch): AnswerContext {
  return {
    config,
    fetch: fetchImpl,
    videos: createVideoMetadataClient(config.youtubeApiKey, fetchImpl),
  };
}
