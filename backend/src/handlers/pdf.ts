export const PDF_ANSWER =
  "PDF processing requires additional libraries. Please extract the relevant information from the PDF and include it in your question.";

// Text extraction is not implemented; the upload is never opened.
export function answerPdfQuestion(): string {
  return PDF_ANSWER;
}
