import type { LlmProvider } from '@socialdraft/shared';
import { LLM_KEY_PRIORITY } from '@socialdraft/shared';
import type { LlmConfig } from '../../config';
import type { SqlExecutor } from '../../db';
import { toErrorMessage } from '../../utils/errors';
import { EncryptionError, type KeyEncryption } from '../keys/encryption';
import { getDecryptedApiKey, type DecryptedApiKey } from '../keys/store';
import { SYSTEM_PROMPT, buildUserPrompt, type PromptInput } from './prompts';

const OPENAI_API_URL = 'https://api.openai.com/v1/chat/completions';
const GEMINI_API_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/models';
const MAX_OUTPUT_TOKENS = 1000;

export type GenerateContentInput = PromptInput;

export interface GeneratedContent {
  content: string;
  hashtags: string[];
  tokensUsed: number;
}

export interface LlmClient {
  readonly provider: LlmProvider;
  generateContent: (input: GenerateContentInput) => Promise<GeneratedContent>;
}

export interface LlmClientOptions {
  model: string;
  temperature: number;
}

// Messages are shown to the user as-is.
export class LlmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LlmError';
  }
}

interface OpenAIChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    total_tokens?: number;
  };
}

interface GeminiGenerateContentResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
  usageMetadata?: {
    totalTokenCount?: number;
  };
}

// Unique #tags in first-seen order.
export function extractHashtags(text: string): string[] {
  return [...new Set(text.match(/#\w+/g) ?? [])];
}

export class OpenAIClient implements LlmClient {
  readonly provider = 'openai';

  constructor(
    private readonly apiKey: string,
    private readonly options: LlmClientOptions,
  ) {}

  async generateContent(input: GenerateContentInput): Promise<GeneratedContent> {
    let response: Response;
    try {
      response = await fetch(OPENAI_API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.options.model,
          temperature: this.options.temperature,
          max_tokens: MAX_OUTPUT_TOKENS,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildUserPrompt(input) },
          ],
        }),
      });
    } catch (error) {
      throw new LlmError(`OpenAI API error: ${toErrorMessage(error)}`);
    }

    if (response.status === 401) {
      throw new LlmError('Invalid OpenAI API key. Please check your key in Settings.');
    }
    if (response.status === 429) {
      throw new LlmError('OpenAI rate limit exceeded. Please try again later.');
    }
    if (!response.ok) {
      const text = await response.text();
      throw new LlmError(`OpenAI API error: ${response.status} ${text}`);
    }

    const data = (await response.json()) as OpenAIChatCompletionResponse;
    const content = data.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new LlmError('OpenAI API error: empty response');
    }

    return {
      content,
      hashtags: extractHashtags(content),
      tokensUsed: data.usage?.total_tokens ?? 0,
    };
  }
}

export class GeminiClient implements LlmClient {
  readonly provider = 'gemini';

  constructor(
    private readonly apiKey: string,
    private readonly options: LlmClientOptions,
  ) {}

  async generateContent(input: GenerateContentInput): Promise<GeneratedContent> {
    const endpoint = `${GEMINI_API_BASE_URL}/${encodeURIComponent(this.options.model)}:generateContent`;
    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey,
        },
        body: JSON.stringify({
          // Gemini takes the system context inline with the prompt.
          contents: [{ role: 'user', parts: [{ text: `${SYSTEM_PROMPT}\n\n${buildUserPrompt(input)}` }] }],
          generationConfig: {
            temperature: this.options.temperature,
            maxOutputTokens: MAX_OUTPUT_TOKENS,
          },
        }),
      });
    } catch (error) {
      throw new LlmError(`Gemini API error: ${toErrorMessage(error)}`);
    }

    if (!response.ok) {
      const text = await response.text();
      throw toGeminiError(response.status, text);
    }

    const data = (await response.json()) as GeminiGenerateContentResponse;
    const content = (data.candidates?.[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('')
      .trim();
    if (!content) {
      throw new LlmError('Gemini API error: empty response');
    }

    return {
      content,
      hashtags: extractHashtags(content),
      tokensUsed: data.usageMetadata?.totalTokenCount ?? 0,
    };
  }
}

function toGeminiError(status: number, body: string): LlmError {
  const lowered = body.toLowerCase();
  if (status === 401 || status === 403 || lowered.includes('api key') || lowered.includes('authenticate')) {
    return new LlmError('Invalid Gemini API key. Please check your key in Settings.');
  }
  if (status === 429 || lowered.includes('quota')) {
    return new LlmError('Gemini API quota exceeded. Please try again later.');
  }
  return new LlmError(`Gemini API error: ${status} ${body}`);
}

export function createLlmClient(provider: LlmProvider, apiKey: string, config: LlmConfig): LlmClient {
  switch (provider) {
    case 'openai':
      return new OpenAIClient(apiKey, { model: config.openaiModel, temperature: config.temperature });
    case 'gemini':
      return new GeminiClient(apiKey, { model: config.geminiModel, temperature: config.temperature });
    default:
      throw new LlmError(`LLM provider ${provider} not yet supported`);
  }
}

/**
 * Picks the user's LLM key in priority order (openai, then gemini, then anthropic)
 * and builds a client for it.
 */
export async function resolveLlmClient(
  db: SqlExecutor,
  encryption: KeyEncryption,
  userId: string,
  config: LlmConfig,
): Promise<LlmClient> {
  for (const provider of LLM_KEY_PRIORITY) {
    let stored: DecryptedApiKey | null;
    try {
      stored = await getDecryptedApiKey(db, encryption, userId, provider);
    } catch (error) {
      if (error instanceof EncryptionError) {
        throw new LlmError('Could not decrypt API key. Please re-enter your key in Settings.');
      }
      throw error;
    }
    if (stored) {
      return createLlmClient(provider, stored.apiKey, config);
    }
  }

  throw new LlmError('No LLM API key configured. Please add your OpenAI or Gemini API key in Settings.');
}
