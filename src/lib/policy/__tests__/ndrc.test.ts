import { fetchNdrcPolicies, ndrcListUrl, parseNdrcListPage } from '../sources/ndrc';

const LIST_HTML = `
<ul class="u-list">
<li><a href="/xxgk/zcfb/fzggwl/202401/t20240115_0001.html">国家发展改革委关于修改部分规章的决定</a><span>2024/01/15</span></li>
<li><a href="./t20231201_0002.html">关于印发投资项目管理办法的通知</a></li>
<li><a href="https://www.ndrc.gov.cn/xxgk/2023-12-20/t0003.html">关于完善价格形成机制的指导意见</a></li>
</ul>`;

const NOW = new Date(2024, 0, 20, 10, 0, 0);

describe('NDRC list pages', () => {
    it('numbers pages from index.html', () => {
        expect(ndrcListUrl(0)).toBe('https://www.ndrc.gov.cn/xxgk/zcfb/fzggwl/index.html');
        expect(ndrcListUrl(2)).toBe('https://www.ndrc.gov.cn/xxgk/zcfb/fzggwl/index_2.html');
    });

    it('parses absolute links, dating them from the href or today', () => {
        const policies = parseNdrcListPage(LIST_HTML, { now: NOW });

        expect(policies).toEqual([
            {
                date: '2024-01-20',
                title: '国家发展改革委关于修改部分规章的决定',
                event_type: '发改委政策',
                source_url: 'https://www.ndrc.gov.cn/xxgk/zcfb/fzggwl/202401/t20240115_0001.html',
                department: '国家发改委',
                policy_level: '国家级',
                impact_level: '高',
                content_type: '政策',
            },
            expect.objectContaining({
                date: '2023-12-20',
                source_url: 'https://www.ndrc.gov.cn/xxgk/2023-12-20/t0003.html',
                impact_level: '中',
            }),
        ]);
    });

    it('keeps only the target month', () => {
        const policies = parseNdrcListPage(LIST_HTML, { now: NOW, targetMonth: '2023-12' });

        expect(policies.map(p => p.title)).toEqual(['关于完善价格形成机制的指导意见']);
    });

    describe('fetchNdrcPolicies', () => {
        const originalFetch = global.fetch;
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

        it('stops at the first missing page', async () => {
            fetchMock
                .mockResolvedValueOnce(new Response(LIST_HTML))
                .mockResolvedValueOnce(new Response('not found', { status: 404 }));

            const policies = await fetchNdrcPolicies({ now: NOW, pageDelayMs: 0 });

            expect(policies).toHaveLength(2);
            expect(fetchMock).toHaveBeenCalledTimes(2);
            expect(fetchMock.mock.calls[1][0]).toBe('https://www.ndrc.gov.cn/xxgk/zcfb/fzggwl/index_1.html');
        });

        it('never walks past the tenth page', async () => {
            fetchMock.mockImplementation(async () => new Response(LIST_HTML));

            const policies = await fetchNdrcPolicies({ now: NOW, maxPages: 25, pageDelayMs: 0 });

            expect(fetchMock).toHaveBeenCalledTimes(10);
            expect(policies).toHaveLength(20);
        });
    });
});
