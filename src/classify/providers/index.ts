import type { LlmProvider, LlmProviderKind, LlmProviderOptions } from '../../types/index.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiProvider } from './openai.js';

export { OpenAiProvider } from './openai.js';
export { OllamaProvider } from './ollama.js';

/**
 * Build the configured classification provider.
 * @throws ConfigError when the provider's credentials are missing
 */
export function createLlmProvider(kind: LlmProviderKind, options: LlmProviderOptions): LlmProvider {
    switch (kind) {
        case 'openai':
            return new OpenAiProvider(options);
        case 'ollama':
            return new OllamaProvider(options);
    }
}
