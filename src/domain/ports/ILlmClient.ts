/**
 * Options for a single chat completion.
 */
export interface ChatCompletionOptions {
    /** Overrides the client's default model */
    model?: string;
    /** Ask the provider for a JSON object response */
    jsonMode?: boolean;
    temperature?: number;
    /** Aborts the request (timeouts are driven by the caller) */
    signal?: AbortSignal;
}

/**
 * ILlmClient - Port for text LLM calls (keyword extraction, prompt building).
 * Implementations: OpenRouterLlmClient
 */
export interface ILlmClient {
    /**
     * Runs a system + user prompt and returns the raw assistant text.
     */
    chatCompletion(prompt: string, systemPrompt: string, options?: ChatCompletionOptions): Promise<string>;
}
