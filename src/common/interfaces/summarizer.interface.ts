export interface SummaryPrompt {
  system: string;
  user: string;
}

export interface ISummarizer {
  summarize(prompt: SummaryPrompt): Promise<string>;
}

export const SUMMARIZER = 'ISummarizer';
