import { BadRequestException, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Settings, requireOpenAI } from '../../config/settings';
import { ConfigurationError, TurnInProgressError, errorMessage } from '../../utils/errors';
import { ConversationTurn, RetrievedDocument, Role, SynthesizedAudio, TurnSource } from '../../utils/types';
import { OpenAIService } from '../openai/openai.service';
import { SearchService } from '../search/search.service';
import { SettingsService } from '../settings/settings.service';
import { SocketGateway } from '../socket-gateway/socket.gateway';
import { SpeechService } from '../speech/speech.service';
import { SystemLogService } from '../system-log/system-log.service';
import { buildMessages } from './prompt';

export type TurnInput =
    | { kind: 'text'; text: string }
    | { kind: 'audio'; audio: Buffer; mimeType: string };

export interface TurnOptions {
    /** Overrides the voice output setting for this turn. */
    speak?: boolean;
}

export interface TurnResult {
    text: string;
    transcript?: string;
    audio?: SynthesizedAudio;
    userTurn: ConversationTurn;
    assistantTurn: ConversationTurn;
}

export interface TurnView {
    id: string;
    role: Role;
    content: string;
    timestamp: string;
    source: TurnSource | null;
    audioUrl: string | null;
}

export function turnView(turn: ConversationTurn): TurnView {
    return {
        id: turn.id,
        role: turn.role,
        content: turn.content,
        timestamp: turn.timestamp,
        source: turn.source ?? null,
        audioUrl: turn.audio ? `/chat/turns/${turn.id}/audio` : null,
    };
}

/**
 * Runs one user turn at a time: transcribe, retrieve, complete, synthesize.
 * Holds the session's conversation history in memory.
 */
@Injectable()
export class ChatService {
    private turns: ConversationTurn[] = [];
    private inFlight = false;

    constructor(
        private readonly settingsService: SettingsService,
        private readonly openAIService: OpenAIService,
        private readonly searchService: SearchService,
        private readonly speechService: SpeechService,
        private readonly systemLog: SystemLogService,
        private readonly socketGateway: SocketGateway,
    ) { }

    history(): ConversationTurn[] {
        return [...this.turns];
    }

    clearHistory() {
        if (this.inFlight) {
            throw new TurnInProgressError();
        }
        const count = this.turns.length;
        this.turns = [];
        this.systemLog.info(`Chat history cleared (${count} turns)`);
        this.socketGateway.broadcast('conversation.cleared', {});
    }

    audioFor(turnId: string): SynthesizedAudio | undefined {
        return this.turns.find(turn => turn.id === turnId)?.audio;
    }

    async handleTurn(input: TurnInput, options: TurnOptions = {}): Promise<TurnResult> {
        if (this.inFlight) {
            throw new TurnInProgressError();
        }
        this.inFlight = true;
        try {
            return await this.runTurn(input, options);
        } finally {
            this.inFlight = false;
        }
    }

    private async runTurn(input: TurnInput, options: TurnOptions): Promise<TurnResult> {
        const settings = this.settingsService.current();

        if (input.kind === 'text' && !input.text.trim()) {
            throw new BadRequestException('กรุณาพิมพ์คำถาม');
        }
        try {
            requireOpenAI(settings.openai);
        } catch (err) {
            this.systemLog.error(errorMessage(err));
            throw err;
        }

        let text: string;
        let transcript: string | undefined;
        if (input.kind === 'audio') {
            try {
                transcript = await this.speechService.transcribe(settings.speech, input.audio, input.mimeType);
            } catch (err) {
                this.systemLog.error(`Transcription failed: ${errorMessage(err)}`);
                throw err;
            }
            this.systemLog.info(`Transcribed: ${transcript}`);
            text = transcript;
        } else {
            text = input.text.trim();
        }

        const priorTurns = this.history();
        const userTurn = this.append('user', text, input.kind === 'audio' ? 'voice' : 'text');
        this.socketGateway.broadcast('conversation.turn', turnView(userTurn));
        this.systemLog.info(`User Query: ${text}`);

        const documents = await this.retrieve(settings, text);
        const messages = buildMessages(
            settings.chat.systemPrompt,
            documents,
            priorTurns,
            text,
            settings.chat.historyWindow,
        );

        let reply: string;
        try {
            reply = await this.openAIService.complete(settings.openai, messages);
        } catch (err) {
            this.systemLog.error(`Error: ${errorMessage(err)}`);
            throw err;
        }
        this.systemLog.info('Successfully received AI response');

        const assistantTurn = this.append('assistant', reply);
        const audio = (options.speak ?? settings.chat.voiceOutput)
            ? await this.speak(settings, reply)
            : undefined;
        if (audio) {
            assistantTurn.audio = audio;
            this.releaseOldAudio(settings.chat.audioRetention);
        }
        this.socketGateway.broadcast('conversation.turn', turnView(assistantTurn));

        return { text: reply, transcript, audio, userTurn, assistantTurn };
    }

    private append(role: Role, content: string, source?: TurnSource): ConversationTurn {
        const turn: ConversationTurn = {
            id: uuidv4(),
            role,
            content,
            timestamp: new Date().toISOString(),
            ...(source ? { source } : {}),
        };
        this.turns.push(turn);
        return turn;
    }

    private releaseOldAudio(keep: number) {
        const voiced = this.turns.filter(turn => turn.audio);
        voiced.slice(0, Math.max(0, voiced.length - keep)).forEach(turn => {
            delete turn.audio;
        });
    }

    private async retrieve(settings: Settings, query: string): Promise<RetrievedDocument[]> {
        const outcome = await this.searchService.search(settings.search, query);
        if (!outcome.ok) {
            if (outcome.error instanceof ConfigurationError) {
                this.systemLog.info('Search not configured; answering without retrieved context');
            } else {
                this.systemLog.warn(`Retrieval unavailable, answering without context: ${errorMessage(outcome.error)}`);
            }
            return [];
        }
        if (outcome.value.length === 0) {
            this.systemLog.info('No documents matched the query');
        } else {
            this.systemLog.info(`Retrieved ${outcome.value.length} documents: ${outcome.value.map(doc => doc.title).join(', ')}`);
        }
        return outcome.value;
    }

    private async speak(settings: Settings, text: string): Promise<SynthesizedAudio | undefined> {
        const outcome = await this.speechService.synthesize(settings.speech, text);
        if (!outcome.ok) {
            this.systemLog.warn(`Speech synthesis unavailable, returning text only: ${errorMessage(outcome.error)}`);
            return undefined;
        }
        this.systemLog.info('Speech synthesis completed successfully');
        return outcome.value;
    }
}
