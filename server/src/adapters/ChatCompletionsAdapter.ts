import axios, { AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import { z } from 'zod';
import { ChatModel, ChatRequest } from './ProviderAdapters';
import { env } from '../config/env';

/** Shape of an OpenAI-compatible /chat/completions reply, reduced to what we read */
const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export interface ChatCompletionsOptions {
  baseUrl?: string;
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  /** Retries on network errors, 429 and 5xx */
  retries?: number;
  client?: AxiosInstance;
}

/**
 * Chat completions over an OpenAI-compatible endpoint (Groq by default).
 *
 * Verification fans out one call per candidate, so rate-limit responses are
 * expected; they are retried a bounded number of times within the same timeout budget.
 */
export class ChatCompletionsAdapter implements ChatModel {
  private readonly client: AxiosInstance;
  private readonly model: string;

  constructor(options: ChatCompletionsOptions = {}) {
    const {
      baseUrl = env.CHAT_BASE_URL,
      apiKey = env.GROQ_API_KEY,
      model = env.VERDICT_MODEL,
      timeoutMs = env.MODEL_TIMEOUT_MS,
      retries = 2,
    } = options;

    this.model = model;
    this.client = options.client ?? axios.create();
    this.client.defaults.baseURL = baseUrl;
    this.client.defaults.timeout = timeoutMs;
    this.client.defaults.headers.common.Authorization = `Bearer ${apiKey}`;

    axiosRetry(this.client, {
      retries,
      retryDelay: axiosRetry.exponentialDelay,
      retryCondition: (err) => {
        const status = err.response?.status;
        return axiosRetry.isNetworkError(err) || status === 429 || (status !== undefined && status >= 500);
      },
    });
  }

  async complete(request: ChatRequest): Promise<string> {
    const { data } = await this.client.post<unknown>('/chat/completions', {
      model: this.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
      temperature: request.temperature,
      ...(request.jsonMode ? { response_format: { type: 'json_object' } } : {}),
    });

    const parsed = completionSchema.parse(data);
    const content = parsed.choices[0].message.content;
    if (content === null) {
      throw new Error('Chat model returned no content');
    }
    return content;
  }
}
