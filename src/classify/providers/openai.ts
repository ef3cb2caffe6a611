import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../../types/index.js';
import { ConfigError } from '../../utils/errors.js';
import { getHttpClient, type HttpClient } from '../../utils/http-client.js';
import { getLogger } from '../../utils/logger.js';

const OPENAI_BASE = 'https://api.openai.com/v1';

/**
 * Chat completions response (subset of relevant fields).
 */
const chatCompletionSchema = z.object({
    model: z.string(),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .optional(),
});

/**
 * OpenAI chat completions provider.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai';
    private httpClient: HttpClient;
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(options: LlmProviderOptions) {
        const apiKey = options.apiKey ?? process.env['OPENAI_API_KEY'];
        if (!apiKey) {
            throw new ConfigError('OPENAI_API_KEY is not set', ['classifier.provider: openai requires OPENAI_API_KEY']);
        }
        this.apiKey = apiKey;
        this.baseUrl = options.baseUrl ?? OPENAI_BASE;
        this.model = options.model;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages = [
            ...(params.systemPrompt ? [{ role: 'system', content: params.systemPrompt }] : []),
            { role: 'user', content: prompt },
        ];

        const body = {
            model: params.model ?? this.model,
            messages,
            temperature: params.temperature ?? 0,
            ...(params.maxTokens ? { max_tokens: params.maxTokens } : {}),
            ...(params.jsonMode ? { response_format: { type: 'json_object' } } : {}),
        };

        getLogger().debug({ model: body.model, promptChars: prompt.length }, 'OpenAI completion');

        const response = await this.httpClient.post(`${this.baseUrl}/chat/completions`, body, {
            source: 'openai',
            headers: { Authorization: `Bearer ${this.apiKey}` },
            signal: params.signal,
        });

        const data = chatCompletionSchema.parse(response.data);
        return {
            text: data.choices[0]?.message.content ?? '',
            usage: {
                promptTokens: data.usage?.prompt_tokens ?? 0,
                completionTokens: data.usage?.completion_tokens ?? 0,
                totalTokens: data.usage?.total_tokens ?? 0,
            },
            model: data.model,
            provider: this.name,
        };
    }
}
