import { GoogleGenAI } from '@google/genai';
import type { AppConfig } from '../../shared/config';
import { RewriteError, errorMessage } from '../errors';
import type { Logger } from '../obs/logger';
import { backoffDelay, sleep } from '../utils/async';

export interface GenerateTextRequest {
  prompt: string;
  systemInstruction?: string;
  signal?: AbortSignal;
}

/** Text-in, text-out model call. The rewrite stage depends only on this shape. */
export type TextGenerator = (request: GenerateTextRequest) => Promise<string>;

const MAX_ATTEMPTS = 3;

const statusOf = (error: unknown): number | null => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
};

export const isTransientError = (error: unknown): boolean => {
  const status = statusOf(error);
  if (status === 429 || status === 500 || status === 503) {
    return true;
  }
  return /quota|unavailable|overload|temporar|rate limit/i.test(errorMessage(error));
};

export const createGeminiGenerator = (config: AppConfig, logger: Logger): TextGenerator => {
  let client: GoogleGenAI | null = null;
  const getClient = () => {
    if (!config.llm.apiKey) {
      throw new RewriteError('GEMINI_API_KEY missing');
    }
    client ??= new GoogleGenAI({ apiKey: config.llm.apiKey });
    return client;
  };

  return async (request) => {
    const ai = getClient();
    for (let attempt = 1; ; attempt += 1) {
      try {
        const response = await ai.models.generateContent({
          model: config.llm.model,
          contents: request.prompt,
          config: {
            systemInstruction: request.systemInstruction,
            temperature: config.llm.temperature,
            maxOutputTokens: config.llm.maxOutputTokens,
            abortSignal: request.signal,
          },
        });
        const text = response.text?.trim();
        if (!text) {
          throw new RewriteError('Empty response from model');
        }
        return text;
      } catch (error) {
        if (request.signal?.aborted) throw error;
        const transient = isTransientError(error);
        logger.warn('Model call failed', { model: config.llm.model, attempt, transient, error: errorMessage(error) });
        if (!transient || attempt >= MAX_ATTEMPTS) {
          throw error instanceof RewriteError
            ? error
            : new RewriteError(`Model call failed after ${attempt} attempt(s): ${errorMessage(error)}`, { transient, cause: error });
        }
        await sleep(backoffDelay(attempt), request.signal);
      }
    }
  };
};
