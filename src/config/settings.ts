import { ConfigurationError, Feature } from '../utils/errors';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful Loan agent that responds in Thai language';

export interface OpenAISettings {
    endpoint?: string;
    apiKey?: string;
    deployment?: string;
    apiVersion: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxRetries: number;
}

export interface SearchSettings {
    endpoint?: string;
    apiKey?: string;
    indexName?: string;
    apiVersion: string;
    topN: number;
    titleField: string;
    contentField: string;
    snippetChars: number;
    timeoutMs: number;
}

export interface SpeechSettings {
    key?: string;
    region?: string;
    voice: string;
    language: string;
    maxAudioSeconds: number;
    timeoutMs: number;
}

export interface ChatSettings {
    systemPrompt: string;
    historyWindow: number;
    voiceOutput: boolean;
    /** Assistant turns that keep their synthesized audio; older clips are dropped. */
    audioRetention: number;
}

export interface Settings {
    openai: OpenAISettings;
    search: SearchSettings;
    speech: SpeechSettings;
    chat: ChatSettings;
    log: { capacity: number };
}

export type EnvLookup = (key: string) => string | undefined;

export function normalizeEndpoint(raw: string | undefined): string | undefined {
    const trimmed = raw?.trim();
    if (!trimmed) return undefined;
    const withoutSlash = trimmed.replace(/\/+$/, '');
    return /^https?:\/\//i.test(withoutSlash) ? withoutSlash : `https://${withoutSlash}`;
}

export function looksLikeAzureOpenAIEndpoint(endpoint: string): boolean {
    try {
        const host = new URL(endpoint).hostname;
        return host.endsWith('.openai.azure.com') || host.endsWith('.cognitiveservices.azure.com');
    } catch {
        return false;
    }
}

function text(raw: string | undefined): string | undefined {
    const trimmed = raw?.trim();
    return trimmed ? trimmed : undefined;
}

function num(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
}

/** Whole numbers at or above `min`; anything else falls back. */
function int(raw: string | undefined, fallback: number, min = 0): number {
    const value = num(raw, fallback);
    return Number.isInteger(value) && value >= min ? value : fallback;
}

function bool(raw: string | undefined, fallback: boolean): boolean {
    const value = raw?.trim().toLowerCase();
    if (value === 'true' || value === '1' || value === 'yes') return true;
    if (value === 'false' || value === '0' || value === 'no') return false;
    return fallback;
}

export function readSettings(env: EnvLookup): Settings {
    return {
        openai: {
            endpoint: normalizeEndpoint(env('AZURE_OAI_ENDPOINT')),
            apiKey: text(env('AZURE_OAI_KEY')),
            deployment: text(env('AZURE_OAI_DEPLOYMENT')),
            apiVersion: text(env('AZURE_API_VERSION')) ?? '2024-06-01',
            temperature: num(env('AZURE_OAI_TEMPERATURE'), 0),
            maxTokens: int(env('AZURE_OAI_MAX_TOKENS'), 1000, 1),
            timeoutMs: int(env('AZURE_OAI_TIMEOUT_MS'), 60_000, 1),
            maxRetries: int(env('AZURE_OAI_MAX_RETRIES'), 0),
        },
        search: {
            endpoint: normalizeEndpoint(env('AZURE_SEARCH_ENDPOINT')),
            apiKey: text(env('AZURE_SEARCH_KEY')),
            indexName: text(env('AZURE_SEARCH_INDEX')),
            apiVersion: text(env('AZURE_SEARCH_API_VERSION')) ?? '2023-11-01',
            topN: int(env('AZURE_SEARCH_TOP_N'), 5, 1),
            titleField: text(env('AZURE_SEARCH_TITLE_FIELD')) ?? 'title',
            contentField: text(env('AZURE_SEARCH_CONTENT_FIELD')) ?? 'content',
            snippetChars: 500,
            timeoutMs: int(env('AZURE_SEARCH_TIMEOUT_MS'), 10_000, 1),
        },
        speech: {
            key: text(env('AZURE_SPEECH_KEY')),
            region: text(env('AZURE_SPEECH_REGION')),
            voice: text(env('AZURE_SPEECH_VOICE')) ?? 'th-TH-PremwadaNeural',
            language: text(env('AZURE_SPEECH_LANGUAGE')) ?? 'th-TH',
            maxAudioSeconds: int(env('AZURE_SPEECH_MAX_AUDIO_SECONDS'), 15, 1),
            timeoutMs: int(env('AZURE_SPEECH_TIMEOUT_MS'), 30_000, 1),
        },
        chat: {
            systemPrompt: text(env('CHAT_SYSTEM_PROMPT')) ?? DEFAULT_SYSTEM_PROMPT,
            historyWindow: int(env('CHAT_HISTORY_WINDOW'), 10),
            voiceOutput: bool(env('CHAT_VOICE_OUTPUT'), true),
            audioRetention: int(env('CHAT_AUDIO_RETENTION'), 20),
        },
        log: {
            capacity: int(env('LOG_CAPACITY'), 500, 1),
        },
    };
}

/**
 * Throws a {@link ConfigurationError} naming the environment key of every
 * empty value. Keys of `values` are the environment variable names.
 */
export function requireSettings(feature: Feature, values: Record<string, string | undefined>): void {
    const missing = Object.entries(values)
        .filter(([, value]) => !value)
        .map(([key]) => key);
    if (missing.length > 0) {
        throw new ConfigurationError(feature, missing);
    }
}

export function isSearchConfigured(search: SearchSettings): boolean {
    return Boolean(search.endpoint && search.apiKey && search.indexName);
}

export function isSpeechConfigured(speech: SpeechSettings): boolean {
    return Boolean(speech.key && speech.region);
}

export function isOpenAIConfigured(openai: OpenAISettings): boolean {
    return Boolean(openai.endpoint && openai.apiKey && openai.deployment);
}

export function requireOpenAI(openai: OpenAISettings) {
    requireSettings('openai', {
        AZURE_OAI_ENDPOINT: openai.endpoint,
        AZURE_OAI_KEY: openai.apiKey,
        AZURE_OAI_DEPLOYMENT: openai.deployment,
    });
    return { endpoint: openai.endpoint ?? '', apiKey: openai.apiKey ?? '', deployment: openai.deployment ?? '' };
}

export function requireSearch(search: SearchSettings) {
    requireSettings('search', {
        AZURE_SEARCH_ENDPOINT: search.endpoint,
        AZURE_SEARCH_KEY: search.apiKey,
        AZURE_SEARCH_INDEX: search.indexName,
    });
    return { endpoint: search.endpoint ?? '', apiKey: search.apiKey ?? '', indexName: search.indexName ?? '' };
}

export function requireSpeech(speech: SpeechSettings) {
    requireSettings('speech', {
        AZURE_SPEECH_KEY: speech.key,
        AZURE_SPEECH_REGION: speech.region,
    });
    return { key: speech.key ?? '', region: speech.region ?? '' };
}

export function maskSecret(secret: string | undefined): string {
    if (!secret) return '';
    return secret.length <= 4 ? '••••' : `••••${secret.slice(-4)}`;
}
