import Groq from 'groq-sdk';
import OpenAI from 'openai';
import type { TokenUsage } from '@ragline/shared';
import type { AppConfig } from '../config';
import { logger } from './logger';

/**
 * LLMClient Interface
 *
 * Vendor-agnostic abstraction for completion calls.
 * Planner, reranker, tools, synthesis and follow-ups all go through it,
 * so swapping providers never touches pipeline logic.
 */

export interface LLMOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface LLMCompletion {
  text: string;
  usage: TokenUsage;
  model: string;
}

export interface LLMClient {
  readonly model: string;
  generate(prompt: string, options?: LLMOptions): Promise<LLMCompletion>;
}

type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

interface RawUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

function buildMessages(prompt: string, options: LLMOptions): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (options.system) {
    messages.push({ role: 'system', content: options.system });
  }
  messages.push({ role: 'user', content: prompt });
  return messages;
}

function toUsage(usage: RawUsage | null | undefined): TokenUsage {
  const promptTokens = usage?.prompt_tokens ?? 0;
  const completionTokens = usage?.completion_tokens ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: usage?.total_tokens ?? promptTokens + completionTokens,
  };
}

/**
 * GroqClient Implementation
 *
 * Uses Groq inference API (fast, cheap/free-tier).
 */
export class GroqClient implements LLMClient {
  private client: Groq;
  readonly model: string;

  constructor(settings: AppConfig['llm']['groq']) {
    // Validate API key is present
    if (!settings.apiKey || settings.apiKey.trim() === '') {
      throw new Error(
        'GROQ_API_KEY is not configured. ' +
        'Set GROQ_API_KEY in .env file or as environment variable.'
      );
    }

    this.client = new Groq({ apiKey: settings.apiKey });
    this.model = settings.model;

    logger.info({ model: this.model }, 'GroqClient initialized');
  }

  async generate(prompt: string, options: LLMOptions = {}): Promise<LLMCompletion> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: buildMessages(prompt, options),
          temperature: options.temperature ?? 0,
          max_tokens: options.maxTokens ?? 500,
          ...(options.jsonMode && { response_format: { type: 'json_object' as const } }),
        },
        { signal: options.signal }
      );

      const text = response.choices[0]?.message?.content?.trim() || '';
      const latency = Date.now() - startTime;

      logger.debug({ latency, model: this.model }, 'LLM generation completed');

      return { text, usage: toUsage(response.usage), model: this.model };
    } catch (error) {
      logger.error({ error, model: this.model }, 'LLM generation failed');
      throw error;
    }
  }
}

/**
 * OpenAIClient Implementation
 */
export class OpenAIClient implements LLMClient {
  private client: OpenAI;
  readonly model: string;

  constructor(settings: AppConfig['llm']['openai']) {
    if (!settings.apiKey || settings.apiKey.trim() === '') {
      throw new Error(
        'OPENAI_API_KEY is not configured. ' +
        'Set OPENAI_API_KEY in .env file or as environment variable.'
      );
    }

    this.client = new OpenAI({ apiKey: settings.apiKey });
    this.model = settings.model;

    logger.info({ model: this.model }, 'OpenAIClient initialized');
  }

  async generate(prompt: string, options: LLMOptions = {}): Promise<LLMCompletion> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: buildMessages(prompt, options),
          temperature: options.temperature ?? 0,
          max_tokens: options.maxTokens ?? 500,
          ...(options.jsonMode && { response_format: { type: 'json_object' as const } }),
        },
        { signal: options.signal }
      );

      const text = response.choices[0]?.message?.content?.trim() || '';
      const latency = Date.now() - startTime;

      logger.debug({ latency, model: this.model }, 'LLM generation completed');

      return { text, usage: toUsage(response.usage), model: this.model };
    } catch (error) {
      logger.error({ error, model: this.model }, 'LLM generation failed');
      throw error;
    }
  }
}

export function createLLMClient(settings: AppConfig['llm']): LLMClient {
  return settings.provider === 'openai'
    ? new OpenAIClient(settings.openai)
    : new GroqClient(settings.groq);
}
