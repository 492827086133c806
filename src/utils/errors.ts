import { HttpException, HttpStatus } from '@nestjs/common';

export type Feature = 'openai' | 'search' | 'speech';

const FEATURE_LABELS: Record<Feature, string> = {
    openai: 'Azure OpenAI',
    search: 'Azure AI Search',
    speech: 'Azure Speech',
};

export class ConfigurationError extends HttpException {
    constructor(readonly feature: Feature, readonly missing: string[], message?: string) {
        super(
            {
                error: 'configuration',
                feature,
                missing,
                message: message ?? `${FEATURE_LABELS[feature]} is not configured. Missing required configuration: ${missing.join(', ')}`,
            },
            HttpStatus.PRECONDITION_FAILED,
        );
    }

    /** A setting that is present but rejected by the service client. */
    static invalid(feature: Feature, detail: string) {
        return new ConfigurationError(feature, [], `${FEATURE_LABELS[feature]} settings are invalid: ${detail}`);
    }
}

export class TranscriptionError extends HttpException {
    constructor(message: string, readonly detail?: string) {
        super({ error: 'transcription', message, detail }, HttpStatus.UNPROCESSABLE_ENTITY);
    }
}

export class CompletionError extends HttpException {
    constructor(message: string, readonly detail: string, readonly upstreamStatus?: number) {
        super({ error: 'completion', message, detail, upstreamStatus }, HttpStatus.BAD_GATEWAY);
    }
}

export class TurnInProgressError extends HttpException {
    constructor() {
        super({ error: 'busy', message: 'กำลังประมวลผลข้อความก่อนหน้า กรุณารอสักครู่' }, HttpStatus.CONFLICT);
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof HttpException) {
        const response = err.getResponse();
        if (typeof response === 'object' && response !== null && 'message' in response && typeof response.message === 'string') {
            return response.message;
        }
    }
    return err instanceof Error ? err.message : String(err);
}
