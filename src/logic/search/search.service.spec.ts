import { Test, TestingModule } from '@nestjs/testing';
import { SearchSettings } from '../../config/settings';
import { ConfigurationError } from '../../utils/errors';
import { SearchService } from './search.service';

const settings: SearchSettings = {
    endpoint: 'https://search.test',
    apiKey: 'test-search-key',
    indexName: 'loans',
    apiVersion: '2023-11-01',
    topN: 2,
    titleField: 'title',
    contentField: 'content',
    snippetChars: 100,
    timeoutMs: 1000,
};

function jsonResponse(body: unknown, status = 200) {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('SearchService', () => {
    let service: SearchService;
    let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

    beforeEach(async () => {
        const module: TestingModule = await Test.createTestingModule({
            providers: [SearchService],
        }).compile();

        service = module.get<SearchService>(SearchService);
        fetchSpy = jest.spyOn(globalThis, 'fetch');
    });

    afterEach(() => {
        fetchSpy.mockRestore();
    });

    it('queries the index and maps the hits', async () => {
        fetchSpy.mockImplementation(async () => jsonResponse({
            value: [
                { '@search.score': 2.5, title: 'สินเชื่อบ้าน', content: 'อัตราดอกเบี้ย   คงที่\n 3 ปี' },
                { '@search.score': 1.2, title: 'ว่าง', content: '' },
                { '@search.score': 0.5, content: 'x'.repeat(150) },
            ],
        }));

        const outcome = await service.search(settings, 'ดอกเบี้ย');

        expect(outcome).toEqual({
            ok: true,
            value: [
                { title: 'สินเชื่อบ้าน', snippet: 'อัตราดอกเบี้ย คงที่ 3 ปี', score: 2.5 },
                { title: 'Document 3', snippet: `${'x'.repeat(100)}…`, score: 0.5 },
            ],
        });

        const [url, init] = fetchSpy.mock.calls[0];
        expect(url).toBe('https://search.test/indexes/loans/docs/search?api-version=2023-11-01');
        expect(init?.method).toBe('POST');
        expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'api-key': 'test-search-key' });
        expect(JSON.parse(String(init?.body))).toEqual({ search: 'ดอกเบี้ย', top: 2, queryType: 'simple' });
    });

    it('returns an empty list when nothing matches', async () => {
        fetchSpy.mockImplementation(async () => jsonResponse({ value: [] }));

        await expect(service.search(settings, 'ไม่มี')).resolves.toEqual({ ok: true, value: [] });
    });

    it('is unavailable on an HTTP error', async () => {
        fetchSpy.mockImplementation(async () => new Response('index missing', { status: 404 }));

        const outcome = await service.search(settings, 'ดอกเบี้ย');

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.message).toBe('Azure AI Search error 404: index missing');
        }
    });

    it('is unavailable when the response is not a search result', async () => {
        fetchSpy.mockImplementation(async () => jsonResponse({ error: 'odd' }));

        const outcome = await service.search(settings, 'ดอกเบี้ย');

        expect(outcome.ok).toBe(false);
    });

    it('is unavailable with a configuration error before any request', async () => {
        const outcome = await service.search({ ...settings, indexName: undefined }, 'ดอกเบี้ย');

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error).toBeInstanceOf(ConfigurationError);
        }
        expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('checks the index for a connection test', async () => {
        fetchSpy.mockImplementation(async () => jsonResponse({ name: 'loans' }));

        await expect(service.testConnection(settings)).resolves.toEqual({
            service: 'search',
            ok: true,
            message: 'Connection successful',
        });
        expect(fetchSpy.mock.calls[0][0]).toBe('https://search.test/indexes/loans?api-version=2023-11-01');
    });

    it('explains a missing index', async () => {
        fetchSpy.mockImplementation(async () => new Response('', { status: 404 }));

        await expect(service.testConnection(settings)).resolves.toEqual({
            service: 'search',
            ok: false,
            message: "Index 'loans' not found (404). Check the index name.",
        });
    });
});
