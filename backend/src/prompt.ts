export const SYSTEM_PROMPT = `You are a helpful assistant for an online degree programme in data science.
Your job is to provide direct, concise answers to assignment questions.
Only provide the final answer without explanation.`;

export function withCsvExcerpt(question: string, table: string): string {
  return `${question}\n\nCSV content (first 10 rows):\n${table}`;
}

export function withVideoInfo(question: string, title: string, description: string): string {
  return `${question}\n\nVideo information:\nTitle: ${title}\nDescription: ${description}`;
}

export function withWebpageExcerpt(question: string, text: string): string {
  return `${question}\n\nWebpage content (excerpt):\n${text}`;
}
