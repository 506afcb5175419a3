import { GoogleGenerativeAI, type Part } from '@google/generative-ai';
import { z } from 'zod';
import { BaseApiClient, type BaseClientOptions } from '../api/base-client.js';
import type { ProviderSettings } from '../config/index.js';
import { ValidationError } from '../lib/errors.js';
import { immediate } from '../lib/retry.js';

export type ProviderKind = 'openai' | 'anthropic' | 'gemini';

/** `anthropic` and `gemini` have their own wire shapes; every other name speaks the OpenAI one. */
export function providerKind(provider: string): ProviderKind {
  const name = provider.toLowerCase();
  if (name === 'anthropic') return 'anthropic';
  if (name === 'gemini' || name === 'google') return 'gemini';
  return 'openai';
}

export const ANTHROPIC_VERSION = '2023-06-01';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface PdfAttachment {
  filename: string;
  base64: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  system?: string;
  temperature: number;
  maxTokens: number;
  /** Attached to the last user message. */
  pdf?: PdfAttachment;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatResponse {
  content: string;
  model: string;
  usage?: TokenUsage;
}

export interface LLMProvider {
  readonly kind: ProviderKind;
  complete(request: ChatRequest): Promise<ChatResponse>;
}

function lastUserIndex(messages: ChatMessage[]): number {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') return i;
  }
  return -1;
}

// OpenAI-compatible chat completions

type OpenAIContent = string | Array<
  | { type: 'text'; text: string }
  | { type: 'file'; file: { filename: string; file_data: string } }
>;

export interface OpenAIChatBody {
  model: string;
  messages: Array<{ role: 'system' | 'user' | 'assistant'; content: OpenAIContent }>;
  temperature: number;
  max_tokens: number;
}

export function buildOpenAIRequest(model: string, request: ChatRequest): OpenAIChatBody {
  const attachAt = request.pdf ? lastUserIndex(request.messages) : -1;
  const messages: OpenAIChatBody['messages'] = [];

  if (request.system) {
    messages.push({ role: 'system', content: request.system });
  }
  request.messages.forEach((message, i) => {
    if (i === attachAt && request.pdf) {
      messages.push({
        role: message.role,
        content: [
          {
            type: 'file',
            file: { filename: request.pdf.filename, file_data: `data:application/pdf;base64,${request.pdf.base64}` },
          },
          { type: 'text', text: message.content },
        ],
      });
    } else {
      messages.push({ role: message.role, content: message.content });
    }
  });

  return { model, messages, temperature: request.temperature, max_tokens: request.maxTokens };
}

const openAIResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
  }).optional(),
});

export function parseOpenAIResponse(data: unknown): Omit<ChatResponse, 'model'> & { model?: string } {
  const parsed = openAIResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError('Unexpected chat completion response: no choices');
  }
  const { choices, usage, model } = parsed.data;
  return {
    content: choices[0].message.content ?? '',
    model,
    usage: usage && { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens },
  };
}

// Anthropic messages

type AnthropicContent = string | Array<
  | { type: 'text'; text: string }
  | { type: 'document'; source: { type: 'base64'; media_type: 'application/pdf'; data: string } }
>;

export interface AnthropicMessagesBody {
  model: string;
  messages: Array<{ role: 'user' | 'assistant'; content: AnthropicContent }>;
  system?: string;
  temperature: number;
  max_tokens: number;
}

export function buildAnthropicRequest(model: string, request: ChatRequest): AnthropicMessagesBody {
  const attachAt = request.pdf ? lastUserIndex(request.messages) : -1;

  const messages = request.messages.map((message, i): AnthropicMessagesBody['messages'][number] => {
    if (i === attachAt && request.pdf) {
      return {
        role: message.role,
        content: [
          { type: 'document', source: { type: 'base64', media_type: 'application/pdf', data: request.pdf.base64 } },
          { type: 'text', text: message.content },
        ],
      };
    }
    return { role: message.role, content: message.content };
  });

  const body: AnthropicMessagesBody = {
    model,
    messages,
    temperature: request.temperature,
    max_tokens: request.maxTokens,
  };
  if (request.system) {
    body.system = request.system;
  }
  return body;
}

const anthropicResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  }).passthrough()),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }).optional(),
});

/** Text blocks joined by newlines; thinking and tool blocks are dropped. */
export function parseAnthropicResponse(data: unknown): Omit<ChatResponse, 'model'> & { model?: string } {
  const parsed = anthropicResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError('Unexpected messages response: no content blocks');
  }
  const { content, usage, model } = parsed.data;
  return {
    content: content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('\n'),
    model,
    usage: usage && { inputTokens: usage.input_tokens, outputTokens: usage.output_tokens },
  };
}

export interface ProviderOptions {
  proxy?: string;
  adapter?: BaseClientOptions['adapter'];
}

function transportOptions(settings: ProviderSettings, headers: Record<string, string>, options: ProviderOptions): BaseClientOptions {
  return {
    baseURL: settings.baseUrl.replace(/\/+$/, ''),
    timeout: settings.timeout * 1000,
    headers: { 'Content-Type': 'application/json', ...headers },
    proxy: options.proxy,
    // LLMClient retries whole calls
    retry: immediate(1),
    adapter: options.adapter,
  };
}

export class OpenAICompatibleProvider extends BaseApiClient implements LLMProvider {
  readonly kind = 'openai';
  private model: string;

  constructor(settings: ProviderSettings, apiKey: string, options: ProviderOptions = {}) {
    super(transportOptions(settings, { Authorization: `Bearer ${apiKey}` }, options));
    this.model = settings.model;
  }

  async complete(request: ChatRequest): Promise<ChatResponse> {
    const data = await this.request<unknown>({
      method: 'POST',
      url: '/chat/completions',
      data: buildOpenAIRequest(this.model, request),
    });
    const parsed = parseOpenAIResponse(data);
    return { ...parsed, model: parsed.model ?? this.model };
  }
}

export class AnthropicProvider extends BaseApiClient implements LLMProvider {
  readonly kind = 'anthropic';
  private model: string;

  constructor(settings: ProviderSettings, apiKey: string, options: ProviderOptions = {}) {
    super(transportOptions(settings, { 'x-api-key': apiKey, 'anthropic-version': ANTHROPIC_VERSION }, options));
    this.model = settings.model;
  }

  async complete(request: ChatRequest): Promise<ChatResponse> {
    const data = await this.request<unknown>({
      method: 'POST',
      url: '/messages',
      data: buildAnthropicRequest(this.model, request),
    });
    const parsed = parseAnthropicResponse(data);
    return { ...parsed, model: parsed.model ?? this.model };
  }
}

/** Through the Gemini SDK, against its default endpoint. */
export class GeminiProvider implements LLMProvider {
  readonly kind = 'gemini';
  private genAI: GoogleGenerativeAI;
  private model: string;
  private timeout: number;

  constructor(settings: ProviderSettings, apiKey: string) {
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.model = settings.model;
    this.timeout = settings.timeout * 1000;
  }

  async complete(request: ChatRequest): Promise<ChatResponse> {
    const model = this.genAI.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: request.system,
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
        },
      },
      { timeout: this.timeout }
    );

    const attachAt = request.pdf ? lastUserIndex(request.messages) : -1;
    const contents = request.messages.map((message, i) => {
      const parts: Part[] = [];
      if (i === attachAt && request.pdf) {
        parts.push({ inlineData: { mimeType: 'application/pdf', data: request.pdf.base64 } });
      }
      parts.push({ text: message.content });
      return { role: message.role === 'assistant' ? 'model' : 'user', parts };
    });

    const result = await model.generateContent({ contents });
    const usage = result.response.usageMetadata;
    return {
      content: result.response.text(),
      model: this.model,
      usage: usage && { inputTokens: usage.promptTokenCount, outputTokens: usage.candidatesTokenCount },
    };
  }
}

export function createProvider(settings: ProviderSettings, apiKey: string, options: ProviderOptions = {}): LLMProvider {
  switch (providerKind(settings.provider)) {
    case 'anthropic':
      return new AnthropicProvider(settings, apiKey, options);
    case 'gemini':
      return new GeminiProvider(settings, apiKey);
    case 'openai':
      return new OpenAICompatibleProvider(settings, apiKey, options);
  }
}
