import { SummaryPrompt } from '../../common/interfaces/summarizer.interface';

export interface BreachSummaryInput {
  source: string;
  date?: string | null;
  risk_level?: string | null;
  description?: string | null;
}

const SYSTEM_PROMPT =
  'You are a world-class cybersecurity analyst. ' +
  'Explain to a non-technical user whose banking information was found in a breach. ' +
  'Keep it serious, clear, and actionable. Use Markdown headings.';

export function formatBreachDetails(matches: BreachSummaryInput[]): string {
  return matches
    .map(
      (breach, i) =>
        `Breach ${i + 1}:\n` +
        `- Source: ${breach.source || 'N/A'}\n` +
        `- Date: ${breach.date || 'N/A'}\n` +
        `- Risk Level: ${breach.risk_level || 'N/A'}\n` +
        `- Description: ${breach.description || 'N/A'}\n\n`,
    )
    .join('');
}

export function buildSummaryPrompt(
  matches: BreachSummaryInput[],
): SummaryPrompt {
  return {
    system: SYSTEM_PROMPT,
    user:
      `My banking detail was found in these breach(es):\n\n${formatBreachDetails(matches)}` +
      'Summarize the situation and provide a prioritized list of 3-5 recommended actions.',
  };
}
