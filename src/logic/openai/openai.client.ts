import { AzureOpenAI } from 'openai';
import type {
    ChatCompletion,
    ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';

export const COMPLETION_CLIENT_FACTORY = Symbol('COMPLETION_CLIENT_FACTORY');

export interface CompletionClientOptions {
    endpoint: string;
    apiKey: string;
    apiVersion: string;
    deployment: string;
    timeout: number;
    maxRetries: number;
}

/** The part of the `openai` client this app calls. */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
        };
    };
}

export type CompletionClientFactory = (options: CompletionClientOptions) => ChatCompletionsClient;

export const createAzureOpenAIClient: CompletionClientFactory = (options) => new AzureOpenAI(options);
