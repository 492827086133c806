import { ConversationTurn, RetrievedDocument } from '../../utils/types';
import { PromptMessage } from '../openai/openai.service';

export const contextInstruction = () => `Use the numbered documents below when they are relevant to the user's question.
If they do not contain the answer, say so instead of guessing. Always reply in Thai.`;

export function contextBlock(documents: RetrievedDocument[]): string {
    return documents
        .map((doc, i) => `[${i + 1}] ${doc.title}\n${doc.snippet}`)
        .join('\n\n');
}

export function systemMessage(systemPrompt: string, documents: RetrievedDocument[]): PromptMessage {
    if (documents.length === 0) {
        return { role: 'system', content: systemPrompt };
    }
    return {
        role: 'system',
        content: `${systemPrompt}\n\n${contextInstruction()}\n\n${contextBlock(documents)}`,
    };
}

/**
 * System instruction (with retrieved context), then at most `historyWindow`
 * of the prior turns, then the new user text.
 */
export function buildMessages(
    systemPrompt: string,
    documents: RetrievedDocument[],
    priorTurns: ConversationTurn[],
    userText: string,
    historyWindow: number,
): PromptMessage[] {
    const window = historyWindow > 0 ? priorTurns.slice(-historyWindow) : [];
    return [
        systemMessage(systemPrompt, documents),
        ...window.map((turn): PromptMessage => ({ role: turn.role, content: turn.content })),
        { role: 'user', content: userText },
    ];
}
