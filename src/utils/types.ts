export type Role = 'user' | 'assistant';

export type TurnSource = 'text' | 'voice';

export interface SynthesizedAudio {
    mimeType: string;
    data: Buffer;
}

export interface ConversationTurn {
    id: string;
    role: Role;
    content: string;
    timestamp: string;
    source?: TurnSource;
    audio?: SynthesizedAudio;
}

export interface RetrievedDocument {
    title: string;
    snippet: string;
    score: number;
}

export type LogSeverity = 'info' | 'warning' | 'error';

export interface LogEntry {
    id: string;
    timestamp: string;
    severity: LogSeverity;
    message: string;
}

export interface ConnectionCheck {
    service: 'openai' | 'search' | 'speech';
    ok: boolean;
    message: string;
}

/**
 * Result of a call the conversation can continue without (retrieval, synthesis).
 */
export type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: Error };

export function available<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function unavailable<T>(error: unknown): Outcome<T> {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
}
