#!/usr/bin/env npx tsx
/**
 * Policy Collection CLI
 *
 * Fetches the latest State Council, NDRC, MOF and CSRC releases, stores the new ones
 * and analyzes what was saved.
 *
 * Usage: npm run fetch:policies -- [--month YYYY-MM] [--pages N]
 *
 * Requires: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY (SILICONFLOW_API_KEY for analysis)
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';
import { createServerSupabase } from '../src/lib/supabase/server';
import { runDataCollection } from '../src/lib/policy/policy-fetcher';

async function main() {
    const { values } = parseArgs({
        options: {
            month: { type: 'string' },
            pages: { type: 'string', default: '10' },
        },
    });

    const targetMonth = values.month;
    if (targetMonth && !/^\d{4}-\d{2}$/.test(targetMonth)) {
        console.error(`ERROR: --month must be YYYY-MM, got "${targetMonth}"`);
        process.exit(1);
    }

    const maxPages = Number.parseInt(values.pages ?? '10', 10);
    if (!Number.isInteger(maxPages) || maxPages < 1) {
        console.error(`ERROR: --pages must be a positive integer, got "${values.pages}"`);
        process.exit(1);
    }

    console.log('═══════════════════════════════════════════════════════════════');
    console.log('  Policy Collection');
    console.log('═══════════════════════════════════════════════════════════════');
    console.log(`Target month: ${targetMonth ?? 'latest'}`);
    console.log(`Max pages:    ${maxPages}`);
    console.log();

    try {
        const result = await runDataCollection(createServerSupabase(), { targetMonth, maxPages });

        console.log();
        console.log('═══════════════════════════════════════════════════════════════');
        console.log('  Summary');
        console.log('═══════════════════════════════════════════════════════════════');
        console.log(`Fetched:  ${result.fetched}`);
        console.log(`New:      ${result.fresh}`);
        console.log(`Saved:    ${result.saved}`);
        console.log(`Analyzed: ${result.analyzed}`);
    } catch (error) {
        console.error('Collection failed:', error);
        process.exit(1);
    }
}

void main();
