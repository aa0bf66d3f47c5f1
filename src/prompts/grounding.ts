export const GROUNDING_RULE =
  'Answer only from the information in the CONTEXT section. ' +
  "If the context does not contain the answer, say that you don't have that information. " +
  'Never invent employers, dates, projects or skills.';

export const NO_CONTEXT_NOTICE =
  'No relevant context was found for this question. Do not guess: ' +
  "tell the visitor you don't have that information and suggest what they could ask instead.";

/**
 * Render the shared CONTEXT / HISTORY sections of a system prompt
 */
export function renderKnowledgeSections(context: string, history: string): string {
  const sections = [
    `CONTEXT:\n${context.trim() ? context : NO_CONTEXT_NOTICE}`
  ];

  if (history) {
    sections.push(`CONVERSATION SO FAR:\n${history}`);
  }

  return sections.join('\n\n');
}
