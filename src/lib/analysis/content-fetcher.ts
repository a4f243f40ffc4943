/**
 * Policy Content Fetcher
 *
 * Downloads a policy's source page and extracts its body text: first from
 * well-known content containers, then from <body> with navigation lines
 * filtered out. Anything shorter than MIN_CONTENT_LENGTH counts as no content.
 *
 * Never throws: failures are logged and yield ''.
 */

import {
    findElementsByAttributeKeyword,
    findFirstTag,
    htmlToLines,
    stripScriptsAndStyles,
} from '@/lib/shared/html-text';

export const MIN_CONTENT_LENGTH = 200;
const REQUEST_TIMEOUT_MS = 10_000;

export const BROWSER_HEADERS: Record<string, string> = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
};

/** class/id keywords of content containers, most specific first */
const CONTENT_CONTAINER_KEYWORDS = [
    'TRS_Editor',
    'Custom_UnionStyle',
    'policy-content',
    'article-content',
    'main-content',
    'pages_content',
    'content',
    'article',
    'text',
];

const NAVIGATION_KEYWORDS = ['导航', '菜单', '首页', '返回', '上一页', '下一页', '版权', '联系我们', 'Copyright'];

/**
 * Extract policy text from a page's HTML
 */
export function extractPolicyText(html: string): string {
    const cleaned = stripScriptsAndStyles(html);

    for (const keyword of CONTENT_CONTAINER_KEYWORDS) {
        for (const inner of findElementsByAttributeKeyword(cleaned, keyword)) {
            const text = htmlToLines(inner).join('\n');
            if (text.length > MIN_CONTENT_LENGTH) {
                return text;
            }
        }
    }

    const body = findFirstTag(cleaned, 'body') ?? cleaned;
    const text = htmlToLines(body)
        .filter(line => line.length > 10 && !NAVIGATION_KEYWORDS.some(k => line.includes(k)))
        .join('\n');

    return text.length > MIN_CONTENT_LENGTH ? text : '';
}

export async function fetchPolicyContent(sourceUrl: string | null): Promise<string> {
    if (!sourceUrl || !sourceUrl.trim()) return '';

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
        console.log(`[ContentFetcher] Fetching ${sourceUrl}`);
        const response = await fetch(sourceUrl, { headers: BROWSER_HEADERS, signal: controller.signal });

        if (!response.ok) {
            console.warn(`[ContentFetcher] HTTP ${response.status} for ${sourceUrl}`);
            return '';
        }

        const text = extractPolicyText(await response.text());
        if (!text) {
            console.warn(`[ContentFetcher] Content too short: ${sourceUrl}`);
        }
        return text;
    } catch (error) {
        console.error(`[ContentFetcher] Failed to fetch ${sourceUrl}:`, error instanceof Error ? error.message : error);
        return '';
    } finally {
        clearTimeout(timeoutId);
    }
}
