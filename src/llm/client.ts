import type { RequestOptions } from '../source.js';

/** JSON-schema description of a function the model must call, in OpenAI's function-calling shape. */
export interface FunctionSchema {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
}

export interface LlmRequest {
    system: string;
    prompt: string;
    model: string;
    maxTokens: number;
    temperature: number;
    responseFormat: 'text' | 'json';
    schema?: FunctionSchema;
}

/**
 * Stateless completion endpoint. Returns the message text, or the function-call arguments when a
 * schema is given. Throws `RateLimitedError`, `TimeoutError` or `InvalidResponseError`.
 */
export interface LlmClient {
    complete(request: LlmRequest, options?: RequestOptions): Promise<string>;
}
