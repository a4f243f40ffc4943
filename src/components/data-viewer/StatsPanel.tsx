import type { DataStatistics } from '@/lib/events/data-statistics';
import type { AnalysisStatistics } from '@/lib/analysis/types';

interface StatsPanelProps {
    data: DataStatistics;
    analysis: AnalysisStatistics;
}

function Stat({ label, value, hint }: { label: string; value: string | number; hint?: string }) {
    return (
        <div className="card p-4">
            <div className="text-2xs text-foreground-muted uppercase tracking-wider">{label}</div>
            <div className="text-xl font-bold text-foreground font-mono">{value}</div>
            {hint && <div className="text-2xs text-foreground-muted mt-1">{hint}</div>}
        </div>
    );
}

export function StatsPanel({ data, analysis }: StatsPanelProps) {
    return (
        <div className="space-y-4">
            <div className="grid grid-cols-2 lg:grid-cols-4 gap-3">
                <Stat label="Events" value={data.total_events} hint={`Latest ${data.latest_event_date}`} />
                <Stat label="Date range" value={`${data.date_range_days}d`} hint={`${data.data_quality.unique_dates} unique dates`} />
                <Stat label="Per month" value={data.data_quality.avg_events_per_month} hint={`Max ${data.data_quality.max_events_per_day} per day`} />
                <Stat label="No industries" value={data.data_quality.empty_industries_count} />
            </div>

            <div className="grid grid-cols-2 lg:grid-cols-4 gap-3">
                <Stat
                    label="Analyzed"
                    value={`${analysis.analyzed_policies} / ${analysis.total_policies}`}
                    hint={`${analysis.analysis_rate}% coverage`}
                />
                <Stat label="Successful" value={analysis.successful_analysis} hint={`${analysis.success_rate}% success`} />
                <Stat label="Need re-analysis" value={analysis.need_reanalysis} hint={`${analysis.failed_analysis} failed, ${analysis.no_industry_analysis} without industry`} />
                <Stat label="Unanalyzed" value={analysis.unanalyzed_policies} />
            </div>

            {data.event_type_stats.length > 0 && (
                <div className="card p-4">
                    <h3 className="text-sm font-semibold text-foreground mb-2">Event types</h3>
                    <div className="space-y-1">
                        {data.event_type_stats.map(stat => (
                            <div key={stat.type} className="flex items-center gap-3 text-xs">
                                <span className="w-24 truncate text-foreground">{stat.type_display}</span>
                                <div className="flex-1 h-2 rounded bg-background-tertiary overflow-hidden">
                                    <div className="h-full bg-desk-policy" style={{ width: `${stat.percentage}%` }} />
                                </div>
                                <span className="w-12 text-right font-mono text-foreground-muted">{stat.count}</span>
                                <span className="w-24 text-right font-mono text-foreground-muted">{stat.latest_date}</span>
                            </div>
                        ))}
                    </div>
                </div>
            )}
        </div>
    );
}
