import axios from 'axios';
import { ChatCompletionOptions, ILlmClient } from '../../domain/ports/ILlmClient';
import { withRetry, isRetryableHttpError } from '../resilience/RetryUtils';
import { extractErrorMessage } from '../resilience/HttpErrors';

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * Text LLM client for OpenRouter's OpenAI-compatible chat completions.
 */
export class OpenRouterLlmClient implements ILlmClient {
    private readonly apiKey: string;
    private readonly model: string;
    private readonly baseUrl: string;
    private readonly extraHeaders: Record<string, string>;
    private readonly maxAttempts: number;

    constructor(
        apiKey: string,
        model: string = 'google/gemini-2.0-flash-001',
        baseUrl: string = 'https://openrouter.ai/api/v1',
        options: { referer?: string; title?: string; maxAttempts?: number } = {}
    ) {
        if (!apiKey) {
            throw new Error('OpenRouter API key is required');
        }
        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
        this.extraHeaders = {
            ...(options.referer ? { 'HTTP-Referer': options.referer } : {}),
            ...(options.title ? { 'X-Title': options.title } : {}),
        };
        this.maxAttempts = options.maxAttempts ?? 3;
    }

    /**
     * Executes a chat completion, retrying on 429/5xx/network errors.
     */
    async chatCompletion(prompt: string, systemPrompt: string, options: ChatCompletionOptions = {}): Promise<string> {
        const { model = this.model, jsonMode = false, temperature = 0.3, signal } = options;

        try {
            return await withRetry(
                () => this.executeRequest(prompt, systemPrompt, model, temperature, jsonMode, signal),
                {
                    maxAttempts: this.maxAttempts,
                    isRetryable: isRetryableHttpError,
                    signal,
                    onRetry: (attempt, error, delay) => {
                        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
                        console.warn(`[OpenRouter] Transient error (${status ?? 'network'}) on attempt ${attempt}, retrying in ${delay / 1000}s...`);
                    },
                }
            );
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const data: unknown = error.response?.data;
                throw new Error(`OpenRouter call failed: ${extractErrorMessage(data) ?? error.message}`);
            }
            throw error;
        }
    }

    private async executeRequest(
        prompt: string,
        systemPrompt: string,
        model: string,
        temperature: number,
        jsonMode: boolean,
        signal?: AbortSignal
    ): Promise<string> {
        const response = await axios.post<ChatCompletionResponse>(
            `${this.baseUrl}/chat/completions`,
            {
                model,
                messages: [
                    { role: 'system', content: systemPrompt },
                    { role: 'user', content: prompt },
                ],
                temperature,
                ...(jsonMode && { response_format: { type: 'json_object' } }),
            },
            {
                headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
                    ...this.extraHeaders,
                },
                signal,
            }
        );

        const content = response.data?.choices?.[0]?.message?.content;
        if (typeof content !== 'string') {
            throw new Error('OpenRouter response contained no message content');
        }
        return content;
    }
}

/**
 * Parses a JSON response from the LLM, tolerating markdown code fences.
 */
export function parseJsonResponse(response: string): unknown {
    const jsonStr = response.replace(/```json\n?|\n?```/g, '').trim();
    try {
        return JSON.parse(jsonStr);
    } catch {
        throw new Error(`Failed to parse LLM response as JSON: ${response.substring(0, 200)}...`);
    }
}
