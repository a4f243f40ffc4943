/**
 * In-process Supabase stand-in for store tests.
 *
 * Every `from(table)` starts a chain that records its calls. Awaiting the
 * chain (or calling single/maybeSingle) resolves the next queued result for
 * that table, or `{ data: null, error: null, count: null }` when the queue
 * is empty.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

export interface MockResponse {
    data: unknown;
    error: { message: string; code?: string } | null;
    count: number | null;
}

export interface RecordedCall {
    table: string;
    method: string;
    args: unknown[];
}

const EMPTY_RESPONSE: MockResponse = { data: null, error: null, count: null };

class MockQuery implements PromiseLike<MockResponse> {
    private pending: Promise<MockResponse> | null = null;

    constructor(
        private readonly owner: MockSupabase,
        private readonly table: string,
    ) {}

    private record(method: string, args: unknown[]): this {
        this.owner.calls.push({ table: this.table, method, args });
        return this;
    }

    private resolve(): Promise<MockResponse> {
        if (!this.pending) {
            this.pending = Promise.resolve(this.owner.next(this.table));
        }
        return this.pending;
    }

    select(...args: unknown[]): this { return this.record('select', args); }
    insert(...args: unknown[]): this { return this.record('insert', args); }
    upsert(...args: unknown[]): this { return this.record('upsert', args); }
    update(...args: unknown[]): this { return this.record('update', args); }
    delete(...args: unknown[]): this { return this.record('delete', args); }
    eq(...args: unknown[]): this { return this.record('eq', args); }
    neq(...args: unknown[]): this { return this.record('neq', args); }
    gt(...args: unknown[]): this { return this.record('gt', args); }
    gte(...args: unknown[]): this { return this.record('gte', args); }
    lt(...args: unknown[]): this { return this.record('lt', args); }
    lte(...args: unknown[]): this { return this.record('lte', args); }
    is(...args: unknown[]): this { return this.record('is', args); }
    not(...args: unknown[]): this { return this.record('not', args); }
    in(...args: unknown[]): this { return this.record('in', args); }
    or(...args: unknown[]): this { return this.record('or', args); }
    ilike(...args: unknown[]): this { return this.record('ilike', args); }
    contains(...args: unknown[]): this { return this.record('contains', args); }
    overlaps(...args: unknown[]): this { return this.record('overlaps', args); }
    order(...args: unknown[]): this { return this.record('order', args); }
    limit(...args: unknown[]): this { return this.record('limit', args); }
    range(...args: unknown[]): this { return this.record('range', args); }

    single(): Promise<MockResponse> {
        this.record('single', []);
        return this.resolve();
    }

    maybeSingle(): Promise<MockResponse> {
        this.record('maybeSingle', []);
        return this.resolve();
    }

    then<TResult1 = MockResponse, TResult2 = never>(
        onfulfilled?: ((value: MockResponse) => TResult1 | PromiseLike<TResult1>) | null,
        onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
    ): Promise<TResult1 | TResult2> {
        return this.resolve().then(onfulfilled, onrejected);
    }
}

export class MockSupabase {
    readonly calls: RecordedCall[] = [];
    private readonly queues = new Map<string, MockResponse[]>();

    /** Queue results for a table, consumed one per awaited chain */
    queue(table: string, ...results: Partial<MockResponse>[]): this {
        const queue = this.queues.get(table) ?? [];
        queue.push(...results.map(r => ({ ...EMPTY_RESPONSE, ...r })));
        this.queues.set(table, queue);
        return this;
    }

    next(table: string): MockResponse {
        return this.queues.get(table)?.shift() ?? EMPTY_RESPONSE;
    }

    from(table: string): MockQuery {
        this.calls.push({ table, method: 'from', args: [table] });
        return new MockQuery(this, table);
    }

    callsFor(table: string, method?: string): RecordedCall[] {
        return this.calls.filter(c => c.table === table && (method === undefined || c.method === method));
    }

    /** Arguments of the first call to `method` on `table` */
    argsOf(table: string, method: string): unknown[] | undefined {
        return this.callsFor(table, method)[0]?.args;
    }

    get client(): SupabaseClient {
        return this as unknown as SupabaseClient;
    }
}

export function createMockSupabase(): MockSupabase {
    return new MockSupabase();
}
