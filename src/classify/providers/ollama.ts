import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../../types/index.js';
import { getHttpClient, type HttpClient } from '../../utils/http-client.js';
import { getLogger } from '../../utils/logger.js';

const OLLAMA_BASE = 'http://localhost:11434';

const generateResponseSchema = z.object({
    model: z.string(),
    response: z.string(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

/**
 * Local Ollama provider (`/api/generate`, non-streaming).
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';
    private httpClient: HttpClient;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(options: LlmProviderOptions) {
        this.baseUrl = (options.baseUrl ?? process.env['OLLAMA_BASE_URL'] ?? OLLAMA_BASE).replace(/\/+$/, '');
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
        const model = params.model ?? this.model;
        getLogger().debug({ model, baseUrl: this.baseUrl }, 'Ollama completion');

        const response = await this.httpClient.post(
            `${this.baseUrl}/api/generate`,
            {
                model,
                prompt,
                stream: false,
                ...(params.systemPrompt ? { system: params.systemPrompt } : {}),
                ...(params.jsonMode ? { format: 'json' } : {}),
                options: {
                    temperature: params.temperature ?? 0,
                    ...(params.maxTokens ? { num_predict: params.maxTokens } : {}),
                },
            },
            { source: 'ollama', signal: params.signal, timeout: 120000 }
        );

        const data = generateResponseSchema.parse(response.data);
        const promptTokens = data.prompt_eval_count ?? 0;
        const completionTokens = data.eval_count ?? 0;
        return {
            text: data.response,
            usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
            model: data.model,
            provider: this.name,
        };
    }
}
