import { SYSTEM_INSTRUCTION } from '../../shared/prompts';
import { renderPrompt } from '../prompts/loader';
import type { TextGenerator } from './genai';

export interface RewriteInput {
  title: string | null;
  text: string;
}

export interface MergeInput extends RewriteInput {
  site: string;
}

const QUOTE_CHARACTERS = /["“”‘’]/g;

/** Quotation marks are banned from rewritten copy; the model does not always comply. */
export const stripQuotes = (text: string): string => text.replace(QUOTE_CHARACTERS, '');

export class RewriteService {
  constructor(
    private readonly generate: TextGenerator,
    private readonly maxInputChars: number,
  ) {}

  async rewrite(input: RewriteInput, signal?: AbortSignal): Promise<string> {
    const prompt = renderPrompt('rewrite_article.md', {
      TITLE: input.title ?? '',
      TEXT: input.text.slice(0, this.maxInputChars),
    });
    const output = await this.generate({ prompt, systemInstruction: SYSTEM_INSTRUCTION, signal });
    return stripQuotes(output);
  }

  async merge(inputs: readonly MergeInput[], signal?: AbortSignal): Promise<string> {
    const sources = inputs
      .map((input, index) => `SOURCE ${index + 1} (${input.site}):\nTitle: ${input.title ?? ''}\nText: ${input.text.slice(0, this.maxInputChars)}`)
      .join('\n\n');
    const prompt = renderPrompt('merge_articles.md', { SOURCES: sources });
    const output = await this.generate({ prompt, systemInstruction: SYSTEM_INSTRUCTION, signal });
    return stripQuotes(output);
  }
}
