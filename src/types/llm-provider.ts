/**
 * Interface for LLM provider adapters (OpenAI, Ollama).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /**
     * Send a completion request to the LLM.
     * @param prompt - The prompt to send
     * @param params - Additional parameters (temperature, max_tokens, etc.)
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** Whether to request JSON response format */
    jsonMode?: boolean;
    /** System prompt */
    systemPrompt?: string;
    signal?: AbortSignal;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers like OpenAI) */
    apiKey?: string;
    /** Base URL (for Ollama or custom endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
}
