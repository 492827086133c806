import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { SearchSettings, requireSearch } from '../../config/settings';
import { ConnectionCheck, Outcome, RetrievedDocument, available, unavailable } from '../../utils/types';

const searchResponseSchema = z.object({
    value: z.array(z.record(z.unknown())),
});

function collapse(text: string, max: number): string {
    const flat = text.replace(/\s+/g, ' ').trim();
    return flat.length > max ? `${flat.slice(0, max).trimEnd()}…` : flat;
}

/**
 * Keyword retrieval against an Azure AI Search index over the REST API.
 */
@Injectable()
export class SearchService {

    private async searchPost<T>(settings: SearchSettings, path: string, body: unknown, schema: z.ZodType<T>): Promise<T> {
        const { endpoint, apiKey } = requireSearch(settings);
        const resp = await fetch(`${endpoint}${path}?api-version=${encodeURIComponent(settings.apiVersion)}`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'api-key': apiKey,
            },
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(settings.timeoutMs),
        });
        if (!resp.ok) {
            const text = await resp.text();
            throw new Error(`Azure AI Search error ${resp.status}: ${text.slice(0, 200)}`);
        }
        return schema.parse(await resp.json());
    }

    async search(settings: SearchSettings, query: string): Promise<Outcome<RetrievedDocument[]>> {
        try {
            const { indexName } = requireSearch(settings);
            const result = await this.searchPost(settings, `/indexes/${encodeURIComponent(indexName)}/docs/search`, {
                search: query,
                top: settings.topN,
                queryType: 'simple',
            }, searchResponseSchema);

            const documents: RetrievedDocument[] = [];
            result.value.forEach((doc, i) => {
                const content = doc[settings.contentField];
                if (typeof content !== 'string' || !content.trim()) return;
                const title = doc[settings.titleField];
                const score = doc['@search.score'];
                documents.push({
                    title: typeof title === 'string' && title.trim() ? title.trim() : `Document ${i + 1}`,
                    snippet: collapse(content, settings.snippetChars),
                    score: typeof score === 'number' ? score : 0,
                });
            });
            return available(documents.slice(0, settings.topN));
        } catch (err) {
            return unavailable(err);
        }
    }

    async testConnection(settings: SearchSettings): Promise<ConnectionCheck> {
        try {
            const { endpoint, apiKey, indexName } = requireSearch(settings);
            const resp = await fetch(
                `${endpoint}/indexes/${encodeURIComponent(indexName)}?api-version=${encodeURIComponent(settings.apiVersion)}`,
                { headers: { 'api-key': apiKey }, signal: AbortSignal.timeout(settings.timeoutMs) },
            );
            if (resp.ok) {
                return { service: 'search', ok: true, message: 'Connection successful' };
            }
            if (resp.status === 404) {
                return { service: 'search', ok: false, message: `Index '${indexName}' not found (404). Check the index name.` };
            }
            if (resp.status === 401 || resp.status === 403) {
                return { service: 'search', ok: false, message: `Authentication failed (${resp.status}). Check your search key.` };
            }
            return { service: 'search', ok: false, message: `HTTP ${resp.status}: ${(await resp.text()).slice(0, 200)}` };
        } catch (err) {
            return { service: 'search', ok: false, message: err instanceof Error ? err.message : String(err) };
        }
    }
}
