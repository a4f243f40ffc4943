import { extractPolicyText, fetchPolicyContent } from '../content-fetcher';

const originalFetch = global.fetch;

const BODY_TEXT = '各地区各部门要加快推进新能源汽车推广应用'.repeat(12);

function page(body: string): string {
    return `<html><head><title>政策</title><style>.x{color:red}</style></head><body>${body}</body></html>`;
}

describe('Policy content fetcher', () => {
    describe('extractPolicyText', () => {
        it('prefers a known content container', () => {
            const html = page(
                `<div class="nav">首页</div><div class="TRS_Editor"><p>${BODY_TEXT}</p><script>var a = 1;</script></div>`,
            );

            expect(extractPolicyText(html)).toBe(BODY_TEXT);
        });

        it('falls back to body lines without navigation text', () => {
            const first = '一'.repeat(120);
            const second = '二'.repeat(120);
            const html = page(`<div class="nav">返回首页</div><p>${first}</p><p>短</p><p>${second}</p>`);

            expect(extractPolicyText(html)).toBe(`${first}\n${second}`);
        });

        it('returns empty text for short pages', () => {
            expect(extractPolicyText(page('<p>页面不存在，请检查链接地址</p>'))).toBe('');
        });
    });

    describe('fetchPolicyContent', () => {
        let fetchMock: jest.Mock<Promise<Response>, [RequestInfo | URL, RequestInit?]>;
        let spies: jest.SpyInstance[];

        beforeEach(() => {
            fetchMock = jest.fn();
            global.fetch = fetchMock;
            spies = [
                jest.spyOn(console, 'log').mockImplementation(() => undefined),
                jest.spyOn(console, 'warn').mockImplementation(() => undefined),
                jest.spyOn(console, 'error').mockImplementation(() => undefined),
            ];
        });

        afterEach(() => {
            global.fetch = originalFetch;
            spies.forEach(spy => spy.mockRestore());
        });

        it('skips empty urls', async () => {
            expect(await fetchPolicyContent(null)).toBe('');
            expect(await fetchPolicyContent('  ')).toBe('');
            expect(fetchMock).not.toHaveBeenCalled();
        });

        it('extracts text from a successful response', async () => {
            fetchMock.mockResolvedValue(new Response(page(`<div id="UCAP-CONTENT"><p>${BODY_TEXT}</p></div>`)));

            expect(await fetchPolicyContent('https://www.gov.cn/a.htm')).toBe(BODY_TEXT);
            expect(fetchMock.mock.calls[0][0]).toBe('https://www.gov.cn/a.htm');
        });

        it('returns empty text on HTTP errors', async () => {
            fetchMock.mockResolvedValue(new Response('gone', { status: 404 }));

            expect(await fetchPolicyContent('https://www.gov.cn/missing.htm')).toBe('');
        });

        it('returns empty text when the request fails', async () => {
            fetchMock.mockRejectedValue(new Error('socket hang up'));

            expect(await fetchPolicyContent('https://www.gov.cn/a.htm')).toBe('');
        });
    });
});
