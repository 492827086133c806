import { Injectable, Logger } from '@nestjs/common';
import * as speechSdk from 'microsoft-cognitiveservices-speech-sdk';
import { parseBuffer } from 'music-metadata';
import { SpeechSettings, requireSpeech } from '../../config/settings';
import { TranscriptionError } from '../../utils/errors';
import { withTimeout } from '../../utils/timeout';
import { ConnectionCheck, Outcome, SynthesizedAudio, available, unavailable } from '../../utils/types';
import { NO_SPEECH_RECOGNIZED, UNSUPPORTED_AUDIO, audioTooLong, recognitionFailed } from './messages';

export const SYNTHESIS_MIME_TYPE = 'audio/mpeg';
const DEFAULT_UPLOAD_MIME_TYPE = 'audio/wav';

export interface AudioInfo {
    container: string;
    durationSeconds?: number;
    sampleRate?: number;
    channels?: number;
}

@Injectable()
export class SpeechService {
    private readonly logger = new Logger(SpeechService.name);

    async inspectAudio(audio: Buffer, mimeType = DEFAULT_UPLOAD_MIME_TYPE): Promise<AudioInfo> {
        const { format } = await parseBuffer(audio, mimeType).catch((err: unknown) => {
            throw new TranscriptionError(UNSUPPORTED_AUDIO, err instanceof Error ? err.message : String(err));
        });
        if (format.container?.toUpperCase() !== 'WAVE') {
            throw new TranscriptionError(UNSUPPORTED_AUDIO, `container ${format.container ?? 'unknown'}`);
        }
        return {
            container: 'WAVE',
            durationSeconds: format.duration,
            sampleRate: format.sampleRate,
            channels: format.numberOfChannels,
        };
    }

    /**
     * Single-shot recognition of a WAV clip. Throws {@link TranscriptionError}
     * when nothing usable comes back.
     */
    async transcribe(settings: SpeechSettings, audio: Buffer, mimeType = DEFAULT_UPLOAD_MIME_TYPE): Promise<string> {
        const { key, region } = requireSpeech(settings);

        const info = await this.inspectAudio(audio, mimeType);
        if (info.durationSeconds !== undefined && info.durationSeconds > settings.maxAudioSeconds) {
            throw new TranscriptionError(audioTooLong(settings.maxAudioSeconds), `duration ${info.durationSeconds.toFixed(1)} s`);
        }

        const speechConfig = speechSdk.SpeechConfig.fromSubscription(key, region);
        speechConfig.speechRecognitionLanguage = settings.language;
        const audioConfig = speechSdk.AudioConfig.fromWavFileInput(audio);
        const recognizer = new speechSdk.SpeechRecognizer(speechConfig, audioConfig);

        let result: speechSdk.SpeechRecognitionResult;
        try {
            result = await withTimeout(
                new Promise<speechSdk.SpeechRecognitionResult>((resolve, reject) => {
                    recognizer.recognizeOnceAsync(resolve, (error) => reject(new Error(error)));
                }),
                settings.timeoutMs,
                'Speech recognition',
            );
        } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            throw new TranscriptionError(recognitionFailed(detail), detail);
        } finally {
            recognizer.close();
        }

        switch (result.reason) {
            case speechSdk.ResultReason.RecognizedSpeech: {
                const text = result.text?.trim();
                if (!text) {
                    throw new TranscriptionError(NO_SPEECH_RECOGNIZED, 'empty transcript');
                }
                this.logger.log(`Transcribed ${audio.length} bytes of audio`);
                return text;
            }
            case speechSdk.ResultReason.NoMatch:
                throw new TranscriptionError(NO_SPEECH_RECOGNIZED, 'no match');
            case speechSdk.ResultReason.Canceled: {
                const detail = result.errorDetails || 'recognition canceled';
                throw new TranscriptionError(recognitionFailed(detail), detail);
            }
            default:
                throw new TranscriptionError(recognitionFailed(`unexpected result ${result.reason}`));
        }
    }

    async synthesize(settings: SpeechSettings, text: string): Promise<Outcome<SynthesizedAudio>> {
        try {
            const { key, region } = requireSpeech(settings);
            if (!text.trim()) {
                return unavailable(new Error('Nothing to synthesize'));
            }

            const speechConfig = speechSdk.SpeechConfig.fromSubscription(key, region);
            speechConfig.speechSynthesisVoiceName = settings.voice;
            speechConfig.speechSynthesisOutputFormat = speechSdk.SpeechSynthesisOutputFormat.Audio16Khz32KBitRateMonoMp3;
            // No audio output device: the bytes come back on the result.
            const synthesizer = new speechSdk.SpeechSynthesizer(speechConfig, null);

            let result: speechSdk.SpeechSynthesisResult;
            try {
                result = await withTimeout(
                    new Promise<speechSdk.SpeechSynthesisResult>((resolve, reject) => {
                        synthesizer.speakTextAsync(text, resolve, (error) => reject(new Error(error)));
                    }),
                    settings.timeoutMs,
                    'Speech synthesis',
                );
            } finally {
                synthesizer.close();
            }

            if (result.reason === speechSdk.ResultReason.SynthesizingAudioCompleted) {
                return available({ mimeType: SYNTHESIS_MIME_TYPE, data: Buffer.from(result.audioData) });
            }
            if (result.reason === speechSdk.ResultReason.Canceled) {
                return unavailable(new Error(`Speech synthesis canceled: ${result.errorDetails || 'no details'}`));
            }
            return unavailable(new Error(`Speech synthesis failed with reason ${result.reason}`));
        } catch (err) {
            return unavailable(err);
        }
    }

    async testConnection(settings: SpeechSettings): Promise<ConnectionCheck> {
        try {
            const { key, region } = requireSpeech(settings);
            const resp = await fetch(`https://${region}.api.cognitive.microsoft.com/sts/v1.0/issueToken`, {
                method: 'POST',
                headers: { 'Ocp-Apim-Subscription-Key': key, 'Content-Length': '0' },
                signal: AbortSignal.timeout(settings.timeoutMs),
            });
            if (resp.ok) {
                return { service: 'speech', ok: true, message: 'Connection successful' };
            }
            if (resp.status === 401 || resp.status === 403) {
                return { service: 'speech', ok: false, message: `Authentication failed (${resp.status}). Check your speech key and region.` };
            }
            return { service: 'speech', ok: false, message: `HTTP ${resp.status}: ${(await resp.text()).slice(0, 200)}` };
        } catch (err) {
            return { service: 'speech', ok: false, message: err instanceof Error ? err.message : String(err) };
        }
    }
}
