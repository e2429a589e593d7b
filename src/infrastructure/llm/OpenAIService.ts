import axios from 'axios';
import { PermanentError, fromHttpError } from '../../domain/errors/PipelineErrors';

export interface ChatCompletionOptions {
    jsonMode?: boolean;
    temperature?: number;
    signal?: AbortSignal;
}

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * Thin chat completions client. Performs a single attempt: retries, breaker and timeouts are
 * applied by the caller's resilience stack.
 */
export class OpenAIService {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(
        apiKey: string,
        model: string = 'gpt-4.1',
        baseUrl: string = 'https://api.openai.com'
    ) {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl;
    }

    /**
     * Host of the API, used as its rate-limit bucket.
     */
    get host(): string {
        return new URL(this.baseUrl).hostname;
    }

    async chatCompletion(
        prompt: string,
        systemPrompt: string,
        options: ChatCompletionOptions = {}
    ): Promise<string> {
        const { jsonMode = false, temperature = 0.7, signal } = options;

        let data: ChatCompletionResponse;
        try {
            const response = await axios.post<ChatCompletionResponse>(
                `${this.baseUrl}/v1/chat/completions`,
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: systemPrompt },
                        { role: 'user', content: prompt },
                    ],
                    temperature: temperature,
                    ...(jsonMode && { response_format: { type: 'json_object' } }),
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    signal,
                }
            );
            data = response.data;
        } catch (error) {
            throw fromHttpError(error, 'OpenAI chat completion');
        }

        const content = data.choices?.[0]?.message?.content;
        if (typeof content !== 'string' || content.length === 0) {
            throw new PermanentError('OpenAI returned no message content', 'EMPTY_COMPLETION');
        }
        return content;
    }

    /**
     * Parses a JSON response from the LLM, handling potential markdown code blocks.
     */
    parseJSON(response: string): unknown {
        try {
            const jsonStr = response.replace(/```json\n?|\n?```/g, '').trim();
            return JSON.parse(jsonStr);
        } catch {
            throw new PermanentError(
                `Failed to parse LLM response as JSON: ${response.substring(0, 200)}...`,
                'SCHEMA_VIOLATION'
            );
        }
    }
}
