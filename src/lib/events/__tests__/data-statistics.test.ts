import { computeDataStatistics, NO_DATA, type StatisticsRow } from '../data-statistics';

function row(date: string, eventType: string | null, industries: string[] = ['银行']): StatisticsRow {
    return { date, event_type: eventType, ai_industries: industries };
}

describe('computeDataStatistics', () => {
    it('aggregates types, dates and quality figures', () => {
        const stats = computeDataStatistics([
            row('2024-01-01', 'policy'),
            row('2024-01-31', 'policy', []),
            row('2024-01-31', 'notice'),
            row('2024-03-01', null),
        ]);

        expect(stats.total_events).toBe(4);
        expect(stats.event_types_count).toBe(3);
        expect(stats.date_range_days).toBe(60);
        expect(stats.latest_event_date).toBe('2024-03-01');
        expect(stats.event_type_stats[0]).toEqual({
            type: 'policy',
            type_display: '政策',
            count: 2,
            percentage: 50,
            latest_date: '2024-01-31',
        });
        expect(stats.event_type_stats.map(s => s.type_display)).toEqual(['政策', '通知', '(none)']);
        expect(stats.data_quality).toEqual({
            completeness: 100,
            avg_events_per_month: 2,
            unique_dates: 3,
            max_events_per_day: 2,
            empty_industries_count: 1,
        });
    });

    it('returns zeros for no rows', () => {
        const stats = computeDataStatistics([]);

        expect(stats.total_events).toBe(0);
        expect(stats.latest_event_date).toBe(NO_DATA);
        expect(stats.event_type_stats).toEqual([]);
        expect(stats.data_quality.max_events_per_day).toBe(0);
        expect(stats.data_quality.avg_events_per_month).toBe(0);
    });
});
