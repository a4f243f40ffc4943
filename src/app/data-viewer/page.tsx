import { createServerSupabase } from "@/lib/supabase/server";
import { listEventDetails } from "@/lib/events/event-store";
import { computeDataStatistics } from "@/lib/events/data-statistics";
import { getAnalysisStatistics } from "@/lib/analysis/analysis-store";
import { StatsPanel } from "@/components/data-viewer/StatsPanel";
import { DataViewerActions } from "@/components/data-viewer/DataViewerActions";
import { EventsTable } from "@/components/data-viewer/EventsTable";

export const dynamic = 'force-dynamic';

export default async function DataViewerPage() {
    try {
        const supabase = createServerSupabase();
        const [events, analysis] = await Promise.all([
            listEventDetails(supabase),
            getAnalysisStatistics(supabase),
        ]);

        return (
            <div className="space-y-6 animate-fade-in">
                <div>
                    <h1 className="text-2xl font-bold text-foreground">Data Viewer</h1>
                    <p className="text-foreground-muted mt-1">Policy events, AI analysis coverage and data maintenance.</p>
                </div>

                <StatsPanel data={computeDataStatistics(events)} analysis={analysis} />
                <DataViewerActions />
                <EventsTable events={events} />
            </div>
        );
    } catch (error) {
        console.error('[DataViewer] Failed to load:', error);
        return (
            <div className="card p-6 max-w-xl">
                <h2 className="font-semibold text-bullish-light mb-2">Could not load data</h2>
                <p className="text-sm text-foreground-muted">
                    {error instanceof Error ? error.message : 'Unknown error'}
                </p>
            </div>
        );
    }
}
