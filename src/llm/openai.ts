import { log } from 'apify';
import OpenAI from 'openai';

import { InvalidResponseError, RateLimitedError, TimeoutError } from '../errors.js';
import type { RequestOptions } from '../source.js';
import type { LlmClient, LlmRequest } from './client.js';

const LOG_PREFIX = '[openai]';

export interface OpenAiClientConfig {
    apiKey: string;
    baseURL?: string;
    timeoutMs: number;
}

const retryAfterMs = (headers: Record<string, string | null | undefined> | undefined): number | null => {
    const value = headers?.['retry-after'];
    if (!value) return null;
    const seconds = Number(value);
    return Number.isFinite(seconds) ? seconds * 1000 : null;
};

/** Maps SDK errors onto the retryable transport errors the pipeline understands. */
export const mapOpenAiError = (error: unknown): unknown => {
    if (error instanceof OpenAI.RateLimitError) {
        return new RateLimitedError(error.message, retryAfterMs(error.headers), { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
        return new TimeoutError(error.message, { cause: error });
    }
    if (error instanceof OpenAI.InternalServerError || error instanceof OpenAI.APIConnectionError) {
        return new InvalidResponseError(error.message, { cause: error });
    }
    return error;
};

/**
 * Chat-completions client. SDK retries are switched off so the pipeline's retry policy is the only
 * one in effect.
 */
export class OpenAiLlmClient implements LlmClient {
    private readonly client: OpenAI;

    constructor(config: OpenAiClientConfig) {
        log.debug(`${LOG_PREFIX} Client configured`, {
            hasApiKey: config.apiKey.length > 0,
            baseURL: config.baseURL ?? 'default (api.openai.com)',
        });
        this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0, timeout: config.timeoutMs });
    }

    async complete(request: LlmRequest, options: RequestOptions = {}): Promise<string> {
        const { schema } = request;
        const body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
            model: request.model,
            max_tokens: request.maxTokens,
            temperature: request.temperature,
            messages: [
                { role: 'system', content: request.system },
                { role: 'user', content: request.prompt },
            ],
        };
        if (schema) {
            body.tools = [{ type: 'function', function: schema }];
            body.tool_choice = { type: 'function', function: { name: schema.name } };
        }
        if (request.responseFormat === 'json') {
            body.response_format = { type: 'json_object' };
        }

        let completion: OpenAI.Chat.Completions.ChatCompletion;
        try {
            completion = await this.client.chat.completions.create(body, { signal: options.signal });
        } catch (error) {
            throw mapOpenAiError(error);
        }

        const choice = completion.choices[0];
        if (!choice) throw new InvalidResponseError('Completion contained no choices');

        const toolCall = choice.message.tool_calls?.find((call) => call.function.name === schema?.name);
        const text = toolCall?.function.arguments ?? choice.message.content;
        if (!text) {
            throw new InvalidResponseError(`Completion had no content (finish_reason=${choice.finish_reason})`);
        }

        log.debug(`${LOG_PREFIX} Completion received`, {
            model: completion.model,
            promptTokens: completion.usage?.prompt_tokens,
            completionTokens: completion.usage?.completion_tokens,
        });
        return text;
    }
}
