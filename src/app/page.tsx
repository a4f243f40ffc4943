import Link from "next/link";
import {
  ChartBarIcon,
  DocumentTextIcon,
  CpuChipIcon,
  ArrowRightIcon,
} from "@heroicons/react/24/outline";
import { StockSearchForm } from "@/components/kline/StockSearchForm";

const examples = [
  { code: "000001.SH", name: "上证指数", kind: "Index" },
  { code: "600519.SH", name: "贵州茅台", kind: "Stock" },
  { code: "300750.SZ", name: "宁德时代", kind: "Stock" },
  { code: "510300.SH", name: "沪深300ETF", kind: "ETF" },
];

const features = [
  {
    icon: ChartBarIcon,
    title: "Daily K-line",
    description: "Candles and volume from TuShare, cached in Supabase and refreshed incrementally.",
  },
  {
    icon: DocumentTextIcon,
    title: "Policy events",
    description: "State Council, NDRC, MOF and CSRC releases collected daily and marked on the dates they were issued.",
  },
  {
    icon: CpuChipIcon,
    title: "Industry matching",
    description: "AI tags each policy and each security with industries; charts show the policies that overlap.",
  },
];

export default function Home() {
  return (
    <div className="max-w-4xl space-y-8 animate-fade-in">
      <div>
        <h1 className="text-2xl font-bold text-foreground">Policy K-line</h1>
        <p className="text-foreground-muted mt-1">
          See how policy releases line up with price action on A-share stocks, ETFs and indices.
        </p>
      </div>

      <StockSearchForm />

      <div>
        <h2 className="text-sm font-semibold text-foreground-muted uppercase tracking-wider mb-3">Examples</h2>
        <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
          {examples.map((item) => (
            <Link
              key={item.code}
              href={`/kline/${item.code}`}
              className="card p-4 hover:bg-card-hover transition-colors group"
            >
              <div className="text-2xs text-foreground-muted">{item.kind}</div>
              <div className="text-sm font-semibold text-foreground">{item.name}</div>
              <div className="flex items-center justify-between mt-1">
                <span className="font-mono text-xs text-foreground-muted">{item.code}</span>
                <ArrowRightIcon className="w-4 h-4 text-foreground-muted group-hover:text-accent" />
              </div>
            </Link>
          ))}
        </div>
      </div>

      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        {features.map((feature) => {
          const Icon = feature.icon;
          return (
            <div key={feature.title} className="card p-4">
              <Icon className="w-6 h-6 text-accent mb-2" />
              <h3 className="text-sm font-semibold text-foreground">{feature.title}</h3>
              <p className="text-xs text-foreground-muted mt-1">{feature.description}</p>
            </div>
          );
        })}
      </div>
    </div>
  );
}
