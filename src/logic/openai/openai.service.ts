import { Inject, Injectable, Logger } from '@nestjs/common';
import {
    APIConnectionError,
    APIConnectionTimeoutError,
    APIError,
} from 'openai/error';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { OpenAISettings, requireOpenAI } from '../../config/settings';
import { CompletionError, ConfigurationError } from '../../utils/errors';
import { ConnectionCheck } from '../../utils/types';
import {
    COMPLETION_CLIENT_FACTORY,
    ChatCompletionsClient,
    CompletionClientFactory,
} from './openai.client';

export interface PromptMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

const TEST_CONNECTION_TIMEOUT_MS = 10_000;

interface FailureDescription {
    status?: number;
    detail: string;
}

function toMessageParam(message: PromptMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        default:
            return { role: 'user', content: message.content };
    }
}

/**
 * Maps an `openai` SDK failure to the text shown in the settings panel and
 * the system log.
 */
export function describeFailure(err: unknown, deployment: string): FailureDescription {
    if (err instanceof APIConnectionTimeoutError) {
        return { detail: 'Connection timeout. Check your network connection.' };
    }
    if (err instanceof APIConnectionError) {
        return { detail: 'Connection error. Check your endpoint URL.' };
    }
    if (err instanceof APIError && err.status !== undefined) {
        switch (err.status) {
            case 404:
                return { status: 404, detail: `Resource not found (404). Check deployment name '${deployment}' and endpoint URL.` };
            case 401:
                return { status: 401, detail: 'Authentication failed (401). Check your API key.' };
            case 403:
                return { status: 403, detail: 'Access forbidden (403). Check your API key permissions.' };
            case 429:
                return { status: 429, detail: 'Rate limit exceeded (429). Wait a moment and try again.' };
            default:
                return { status: err.status, detail: `HTTP ${err.status}: ${err.message}` };
        }
    }
    return { detail: err instanceof Error ? err.message : String(err) };
}

@Injectable()
export class OpenAIService {
    private readonly logger = new Logger(OpenAIService.name);

    constructor(
        @Inject(COMPLETION_CLIENT_FACTORY)
        private readonly createClient: CompletionClientFactory,
    ) { }

    private client(settings: OpenAISettings, overrides: { timeout?: number; maxRetries?: number } = {}): ChatCompletionsClient {
        const { endpoint, apiKey, deployment } = requireOpenAI(settings);
        try {
            return this.createClient({
                endpoint,
                apiKey,
                deployment,
                apiVersion: settings.apiVersion,
                timeout: overrides.timeout ?? settings.timeoutMs,
                maxRetries: overrides.maxRetries ?? settings.maxRetries,
            });
        } catch (err) {
            throw ConfigurationError.invalid('openai', err instanceof Error ? err.message : String(err));
        }
    }

    async complete(settings: OpenAISettings, messages: PromptMessage[]): Promise<string> {
        const client = this.client(settings);
        const deployment = settings.deployment ?? '';

        let content: string | null | undefined;
        try {
            const response = await client.chat.completions.create({
                model: deployment,
                messages: messages.map(toMessageParam),
                temperature: settings.temperature,
                max_tokens: settings.maxTokens,
            });
            content = response.choices[0]?.message?.content;
        } catch (err) {
            const { status, detail } = describeFailure(err, deployment);
            this.logger.error(`Completion request failed: ${detail}`);
            throw new CompletionError(`เกิดข้อผิดพลาด: ${detail}`, detail, status);
        }

        if (!content?.trim()) {
            const detail = 'The model returned an empty response.';
            throw new CompletionError(`เกิดข้อผิดพลาด: ${detail}`, detail);
        }
        return content;
    }

    async testConnection(settings: OpenAISettings): Promise<ConnectionCheck> {
        let client: ChatCompletionsClient;
        try {
            client = this.client(settings, { timeout: TEST_CONNECTION_TIMEOUT_MS, maxRetries: 0 });
        } catch (err) {
            return { service: 'openai', ok: false, message: err instanceof Error ? err.message : String(err) };
        }

        const deployment = settings.deployment ?? '';
        try {
            await client.chat.completions.create({
                model: deployment,
                messages: [{ role: 'user', content: 'Hello' }],
                max_tokens: 10,
            });
            return { service: 'openai', ok: true, message: 'Connection successful' };
        } catch (err) {
            return { service: 'openai', ok: false, message: describeFailure(err, deployment).detail };
        }
    }
}
