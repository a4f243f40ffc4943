/**
 * Regex-based HTML helpers for scraped government pages.
 *
 * Pages are flat, server-rendered HTML; these helpers find a container by
 * class/id keyword, cut it out by tag depth, and flatten it to text lines.
 */

const NAMED_ENTITIES: Record<string, string> = {
    nbsp: ' ',
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    ldquo: '“',
    rdquo: '”',
    lsquo: '‘',
    rsquo: '’',
    middot: '·',
    mdash: '—',
    hellip: '…',
};

export function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
        if (entity[0] === '#') {
            const code = entity[1] === 'x' || entity[1] === 'X'
                ? parseInt(entity.slice(2), 16)
                : parseInt(entity.slice(1), 10);
            return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
        }
        return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
    });
}

export function stripScriptsAndStyles(html: string): string {
    return html
        .replace(/<script\b[\s\S]*?<\/script>/gi, '')
        .replace(/<style\b[\s\S]*?<\/style>/gi, '')
        .replace(/<!--[\s\S]*?-->/g, '');
}

/**
 * Flatten HTML to trimmed, non-empty text lines
 */
export function htmlToLines(html: string): string[] {
    const withBreaks = stripScriptsAndStyles(html)
        .replace(/<br\s*\/?>/gi, '\n')
        .replace(/<\/(p|div|li|tr|h[1-6]|section|article|td)>/gi, '\n')
        .replace(/<[^>]+>/g, '');

    return decodeEntities(withBreaks)
        .split('\n')
        .map(line => line.replace(/\s+/g, ' ').trim())
        .filter(line => line.length > 0);
}

export function stripTags(html: string): string {
    return decodeEntities(html.replace(/<[^>]+>/g, '')).replace(/\s+/g, ' ').trim();
}

/**
 * Slice out the element whose opening tag starts at `openIndex`, including
 * nested elements of the same tag name. Unclosed elements run to the end.
 */
export function sliceElement(html: string, openIndex: number, tagName: string): string {
    const tagPattern = new RegExp(`<(/?)${tagName}\\b[^>]*>`, 'gi');
    tagPattern.lastIndex = openIndex;

    let depth = 0;
    let match: RegExpExecArray | null;
    while ((match = tagPattern.exec(html)) !== null) {
        depth += match[1] === '/' ? -1 : 1;
        if (depth === 0) {
            return html.slice(openIndex, match.index + match[0].length);
        }
    }

    return html.slice(openIndex);
}

/**
 * Inner HTML of every element whose class or id contains `keyword`,
 * in document order
 */
export function findElementsByAttributeKeyword(html: string, keyword: string): string[] {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const openPattern = new RegExp(
        `<([a-z][a-z0-9]*)\\b[^>]*\\b(?:class|id)\\s*=\\s*["'][^"']*${escaped}[^"']*["'][^>]*>`,
        'gi',
    );

    const elements: string[] = [];
    let match: RegExpExecArray | null;
    while ((match = openPattern.exec(html)) !== null) {
        const element = sliceElement(html, match.index, match[1]);
        elements.push(element.slice(match[0].length));
    }
    return elements;
}

/**
 * Inner HTML of the first element with the given tag name
 */
export function findFirstTag(html: string, tagName: string): string | null {
    const match = new RegExp(`<${tagName}\\b[^>]*>`, 'i').exec(html);
    if (!match) return null;
    return sliceElement(html, match.index, tagName).slice(match[0].length);
}
