/**
 * Row builders shared by store, analyzer and route tests
 */

import type { PolicyEventDetails } from '@/lib/events/types';

export function makeEventDetails(overrides: Partial<PolicyEventDetails> = {}): PolicyEventDetails {
    return {
        id: 1,
        date: '2024-01-15',
        title: '关于促进新能源汽车产业发展的通知',
        event_type: 'policy',
        content: null,
        source_url: 'https://www.gov.cn/zhengce/content/202401/content_0001.htm',
        department: '国务院',
        policy_level: '国家级',
        impact_level: '中',
        content_type: '政策',
        created_at: '2024-01-15T08:00:00Z',
        analysis_id: null,
        ai_industries: [],
        ai_summary: null,
        ai_confidence: null,
        content_quality: null,
        ...overrides,
    };
}
