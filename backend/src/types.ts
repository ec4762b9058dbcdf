export type QuestionRequest = {
  question: string;
  filePath?: string;
};

export type AnswerResponse = {
  answer: string;
};

export type ErrorResponse = {
  error: string;
};

export type StatusResponse = {
  status: string;
  usage: string;
};

export type HandlerKind = "csv" | "pdf" | "youtube" | "webpage" | "general";

export type VideoInfo = {
  title: string;
  description: string;
};
