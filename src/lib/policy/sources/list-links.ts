/**
 * Anchor extraction shared by the HTML list-page sources
 */

import { stripTags } from '@/lib/shared/html-text';
import { normalizeDayString } from '@/lib/shared/dates';
import { shouldSkipContent } from '../classifier';

const MIN_TITLE_LENGTH = 10;
/** How far past an anchor to look for its listing date */
const DATE_LOOKAHEAD_CHARS = 300;

const ANCHOR_PATTERN = /<a\b([^>]*)>([\s\S]*?)<\/a>/gi;
const HREF_PATTERN = /\bhref\s*=\s*["']([^"']+)["']/i;
const LOOSE_DATE = /(\d{4}[-/]\d{1,2}[-/]\d{1,2})/;
const STRICT_DATE = /\d{4}-\d{2}-\d{2}/;

export interface ListLink {
    href: string;
    /** Absolute URL */
    url: string;
    title: string;
    /** Page HTML after the closing </a> */
    following: string;
    /** HTML of the <li> holding the anchor, or '' */
    listItem: string;
}

function absolutize(href: string, baseUrl: string): string | null {
    if (href.startsWith('/')) return baseUrl + href;
    if (href.startsWith('http')) return href;
    return null;
}

function enclosingListItem(html: string, start: number, end: number): string {
    const open = html.lastIndexOf('<li', start);
    if (open < 0 || html.lastIndexOf('</li>', start) > open) return '';
    const close = html.indexOf('</li>', end);
    return close < 0 ? '' : html.slice(open, close);
}

/**
 * Anchors whose text looks like a policy title and whose href resolves
 * against `baseUrl`
 */
export function extractListLinks(html: string, baseUrl: string): ListLink[] {
    const links: ListLink[] = [];

    let match: RegExpExecArray | null;
    ANCHOR_PATTERN.lastIndex = 0;
    while ((match = ANCHOR_PATTERN.exec(html)) !== null) {
        const hrefMatch = HREF_PATTERN.exec(match[1]);
        const title = stripTags(match[2]);
        if (!hrefMatch || shouldSkipContent(title) || title.length <= MIN_TITLE_LENGTH) continue;

        const href = hrefMatch[1].trim();
        const url = absolutize(href, baseUrl);
        if (!url) continue;

        const end = match.index + match[0].length;
        links.push({
            href,
            url,
            title,
            following: html.slice(end),
            listItem: enclosingListItem(html, match.index, end),
        });
    }

    return links;
}

/** Date embedded in the link's href or title, e.g. /2024-01-15/ */
export function findInlineDate(link: Pick<ListLink, 'href' | 'title'>): string | null {
    const inline = LOOSE_DATE.exec(link.href + link.title);
    return inline ? normalizeDayString(inline[1]) : null;
}

/** First YYYY-MM-DD in the text after the anchor, up to the next anchor */
export function findFollowingDate(following: string): string | null {
    const nextAnchor = following.search(/<a\b/i);
    const limit = nextAnchor >= 0 ? Math.min(nextAnchor, DATE_LOOKAHEAD_CHARS) : DATE_LOOKAHEAD_CHARS;
    const nearby = STRICT_DATE.exec(stripTags(following.slice(0, limit)));
    return nearby ? nearby[0] : null;
}

/** First YYYY-MM-DD in the text of the anchor's list item */
export function findListItemDate(listItem: string): string | null {
    if (!listItem) return null;
    const found = STRICT_DATE.exec(stripTags(listItem));
    return found ? found[0] : null;
}
