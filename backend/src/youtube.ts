import { Innertube } from "youtubei.js";
import type { VideoInfo } from "./types";

const DATA_API_URL = "https://www.googleapis.com/youtube/v3/videos";

export interface VideoMetadataClient {
  getVideoInfo(videoUrl: string): Promise<VideoInfo>;
}

export class VideoMetadataError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = "VideoMetadataError";
  }
}

interface VideosListResponse {
  items?: Array<{
    id?: string;
    snippet?: {
      title?: string;
      description?: string;
    };
  }>;
}

export function extractVideoId(videoUrl: string): string | null {
  const match = /(?:youtube\.com\/watch\?v=|youtu\.be\/)([\w-]+)/i.exec(videoUrl);
  return match ? match[1] : null;
}

async function failWith(response: Response): Promise<never> {
  const text = await response.text().catch(() => "Unknown error");
  console.error(`[YouTube] Metadata request failed ${response.status}: ${text}`);
  throw new VideoMetadataError(`Video metadata request failed with status ${response.status}`, response.status);
}

/**
 * Looks up title and description through the YouTube Data API when a key is configured,
 * otherwise through the keyless InnerTube API that the YouTube web client uses.
 */
export function createVideoMetadataClient(apiKey: string | undefined, fetchImpl: typeof fetch): VideoMetadataClient {
  let session: Promise<Innertube> | undefined;

  async function fromDataApi(key: string, videoId: string): Promise<VideoInfo> {
    const params = new URLSearchParams({ part: "snippet", id: videoId, key });
    const response = await fetchImpl(`${DATA_API_URL}?${params.toString()}`, { method: "GET" });
    if (!response.ok) {
      return failWith(response);
    }

    const data = (await response.json()) as VideosListResponse;
    const snippet = data.items?.[0]?.snippet;
    if (!snippet) {
      throw new VideoMetadataError(`Video ${videoId} not found`, 404);
    }

    return {
      title: snippet.title ?? "",
      description: snippet.description ?? "",
    };
  }

  // One session per client; a failed handshake is retried on the next lookup.
  function innertube(): Promise<Innertube> {
    if (!session) {
      session = Innertube.create({ retrieve_player: false }).catch((error: unknown) => {
        session = undefined;
        throw error;
      });
    }
    return session;
  }

  async function fromInnertube(videoId: string): Promise<VideoInfo> {
    const info = await (await innertube()).getBasicInfo(videoId);
    const title = info.basic_info.title;
    if (!title) {
      throw new VideoMetadataError(`Video ${videoId} not found`, 404);
    }

    return {
      title,
      description: info.basic_info.short_description ?? "",
    };
  }

  return {
    async getVideoInfo(videoUrl: string): Promise<VideoInfo> {
      const videoId = extractVideoId(videoUrl);
      if (!videoId) {
        throw new VideoMetadataError(`Could not read a video id from ${videoUrl}`, 400);
      }

      if (apiKey) {
        return fromDataApi(apiKey, videoId);
      }
      console.log("[YouTube] YOUTUBE_API_KEY not set, using InnerTube");
      return fromInnertube(videoId);
    },
  };
}
