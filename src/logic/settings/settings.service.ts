import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
    Settings,
    isOpenAIConfigured,
    isSearchConfigured,
    isSpeechConfigured,
    looksLikeAzureOpenAIEndpoint,
    maskSecret,
    normalizeEndpoint,
    readSettings,
    requireOpenAI,
    requireSearch,
    requireSpeech,
} from '../../config/settings';
import { ConfigurationError } from '../../utils/errors';
import { ConnectionCheck } from '../../utils/types';
import { OpenAIService } from '../openai/openai.service';
import { SearchService } from '../search/search.service';
import { SpeechService } from '../speech/speech.service';
import { SystemLogService } from '../system-log/system-log.service';
import { UpdateSettingsDto } from './dto/update-settings.dto';

function missingFor(check: () => unknown): string[] {
    try {
        check();
        return [];
    } catch (err) {
        if (err instanceof ConfigurationError) return err.missing;
        throw err;
    }
}

function optional(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

/**
 * Owns the session's settings. Loaded from the environment at start and
 * replaced wholesale whenever the settings panel saves.
 */
@Injectable()
export class SettingsService {
    private settings: Settings;

    constructor(
        private readonly configService: ConfigService,
        private readonly systemLog: SystemLogService,
        private readonly openAIService: OpenAIService,
        private readonly searchService: SearchService,
        private readonly speechService: SpeechService,
    ) {
        this.settings = readSettings((key) => this.configService.get<string>(key));
        this.systemLog.resize(this.settings.log.capacity);
    }

    current(): Settings {
        return this.settings;
    }

    update(patch: UpdateSettingsDto): Settings {
        const { openai, search, speech, chat } = this.settings;
        const next: Settings = {
            ...this.settings,
            openai: {
                ...openai,
                endpoint: patch.openaiEndpoint !== undefined ? normalizeEndpoint(patch.openaiEndpoint) : openai.endpoint,
                apiKey: patch.openaiApiKey !== undefined ? optional(patch.openaiApiKey) : openai.apiKey,
                deployment: patch.openaiDeployment !== undefined ? optional(patch.openaiDeployment) : openai.deployment,
                apiVersion: optional(patch.openaiApiVersion) ?? openai.apiVersion,
            },
            search: {
                ...search,
                endpoint: patch.searchEndpoint !== undefined ? normalizeEndpoint(patch.searchEndpoint) : search.endpoint,
                apiKey: patch.searchApiKey !== undefined ? optional(patch.searchApiKey) : search.apiKey,
                indexName: patch.searchIndex !== undefined ? optional(patch.searchIndex) : search.indexName,
            },
            speech: {
                ...speech,
                key: patch.speechKey !== undefined ? optional(patch.speechKey) : speech.key,
                region: patch.speechRegion !== undefined ? optional(patch.speechRegion) : speech.region,
                voice: optional(patch.speechVoice) ?? speech.voice,
            },
            chat: {
                ...chat,
                systemPrompt: optional(patch.systemPrompt) ?? chat.systemPrompt,
                historyWindow: patch.historyWindow ?? chat.historyWindow,
                voiceOutput: patch.voiceOutput ?? chat.voiceOutput,
            },
        };

        const changed = Object.entries(patch)
            .filter(([, value]) => value !== undefined)
            .map(([field]) => field);
        this.settings = next;
        if (changed.length > 0) {
            this.systemLog.info(`Settings updated: ${changed.join(', ')}`);
        }
        return next;
    }

    describe() {
        const { openai, search, speech, chat } = this.settings;
        const warnings: string[] = [];
        if (openai.endpoint && !looksLikeAzureOpenAIEndpoint(openai.endpoint)) {
            warnings.push(`Endpoint doesn't appear to be a valid Azure OpenAI endpoint: ${openai.endpoint}`);
        }

        return {
            openai: {
                configured: isOpenAIConfigured(openai),
                missing: missingFor(() => requireOpenAI(openai)),
                endpoint: openai.endpoint ?? null,
                deployment: openai.deployment ?? null,
                apiVersion: openai.apiVersion,
                apiKey: maskSecret(openai.apiKey),
                warnings,
            },
            search: {
                configured: isSearchConfigured(search),
                missing: missingFor(() => requireSearch(search)),
                endpoint: search.endpoint ?? null,
                indexName: search.indexName ?? null,
                apiKey: maskSecret(search.apiKey),
                topN: search.topN,
            },
            speech: {
                configured: isSpeechConfigured(speech),
                missing: missingFor(() => requireSpeech(speech)),
                region: speech.region ?? null,
                voice: speech.voice,
                language: speech.language,
                key: maskSecret(speech.key),
                maxAudioSeconds: speech.maxAudioSeconds,
            },
            chat: { ...chat },
        };
    }

    async testConnection(): Promise<ConnectionCheck[]> {
        const settings = this.settings;
        const checks = [
            await this.openAIService.testConnection(settings.openai),
            await this.searchService.testConnection(settings.search),
            await this.speechService.testConnection(settings.speech),
        ];
        for (const check of checks) {
            const line = `Test connection (${check.service}): ${check.message}`;
            if (check.ok) {
                this.systemLog.info(line);
            } else {
                this.systemLog.warn(line);
            }
        }
        return checks;
    }
}
