import { PROMPT_TEMPLATES } from '../../shared/prompts';

export const loadPrompt = (filename: string): string => {
  const content = PROMPT_TEMPLATES[filename];
  if (!content) {
    throw new Error(`Missing prompt template: ${filename}`);
  }
  return content;
};

/** Fills `{KEY}` placeholders. Values are inserted verbatim. */
export const renderPrompt = (filename: string, values: Record<string, string>): string => {
  const template = loadPrompt(filename);
  return template.replace(/\{([A-Z_]+)\}/g, (match, key: string) => values[key] ?? match).trim();
};
