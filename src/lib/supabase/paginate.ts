/**
 * Page through a PostgREST select past the 1000-row response cap.
 */

interface PageResult {
    data: unknown[] | null;
    error: { message: string } | null;
}

export const DEFAULT_PAGE_SIZE = 1000;

export async function selectAllPages<T>(
    context: string,
    buildPage: (from: number, to: number) => PromiseLike<PageResult>,
    mapRow: (row: unknown) => T | null,
    pageSize: number = DEFAULT_PAGE_SIZE,
): Promise<T[]> {
    const results: T[] = [];

    for (let from = 0; ; from += pageSize) {
        const { data, error } = await buildPage(from, from + pageSize - 1);

        if (error) {
            console.error(`[Supabase] ${context} error:`, error);
            throw new Error(`Failed to ${context}: ${error.message}`);
        }

        const rows = data ?? [];
        for (const row of rows) {
            const mapped = mapRow(row);
            if (mapped !== null) results.push(mapped);
        }

        if (rows.length < pageSize) break;
    }

    return results;
}
