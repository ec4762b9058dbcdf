import cors from "cors";
import express, { type ErrorRequestHandler, type Express, type Request } from "express";
import multer from "multer";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "./config";
import type { AnswerContext } from "./context";
import { answerQuestion } from "./router";
import { sanitizeFilename, withTempDir } from "./tempfiles";
import type { AnswerResponse, ErrorResponse, QuestionRequest, StatusResponse } from "./types";

export type AnswerFn = (request: QuestionRequest, ctx: AnswerContext) => Promise<string>;

export type AppOptions = {
  context: AnswerContext;
  answer?: AnswerFn;
};

export const STATUS: StatusResponse = {
  status: "API is running",
  usage: "Send POST requests to / with 'question' and optional 'file'",
};

function readQuestion(body: unknown): string | null {
  if (!body || typeof body !== "object") {
    return null;
  }

  const candidate = (body as { question?: unknown }).question;
  if (typeof candidate !== "string" || candidate.length === 0) {
    return null;
  }

  return candidate;
}

type UploadedFile = NonNullable<Request["file"]>;

// Only the "file" field is read; uploads under other names are ignored.
function pickUpload(files: Request["files"]): UploadedFile | undefined {
  const uploads = Array.isArray(files) ? files : Object.values(files ?? {}).flat();
  return uploads.find((upload) => upload.fieldname === "file");
}

export function createApp({ context, answer = answerQuestion }: AppOptions): Express {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: context.config.maxUploadBytes },
  });

  app.use(cors());
  app.use(express.json({ limit: "200kb" }));
  app.use(express.urlencoded({ extended: false, limit: "200kb" }));

  app.get("/", (_req, res) => {
    res.json(STATUS);
  });

  app.post("/", upload.any(), async (req, res, next) => {
    const question = readQuestion(req.body);
    if (!question) {
      const body: ErrorResponse = { error: "No question provided" };
      res.status(400).json(body);
      return;
    }

    const file = pickUpload(req.files);
    console.log("[POST /] Received question:");
    console.log(`- question: ${question}`);
    console.log(`- file: ${file?.originalname ? `${file.originalname} (${file.size} bytes)` : "(none)"}`);

    try {
      const result =
        file && file.originalname
          ? await withTempDir("upload", async (dir) => {
              const filePath = path.join(dir, sanitizeFilename(file.originalname));
              await writeFile(filePath, file.buffer);
              return answer({ question, filePath }, context);
            })
          : await answer({ question }, context);

      const body: AnswerResponse = { answer: result };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    console.error(`[POST /] Error: ${errorMessage(error)}`);
    const body: ErrorResponse = { error: errorMessage(error) };
    res.status(500).json(body);
  };
  app.use(handleError);

  return app;
}
