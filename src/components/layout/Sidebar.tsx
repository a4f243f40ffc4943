"use client";

import { useState } from "react";
import Link from "next/link";
import { useRouter, usePathname } from "next/navigation";
import {
    ChartBarIcon,
    HomeIcon,
    TableCellsIcon,
    MagnifyingGlassIcon,
} from "@heroicons/react/24/outline";

interface NavItem {
    name: string;
    href: string;
    icon: React.ComponentType<{ className?: string }>;
    color: string;
    description: string;
}

const navItems: NavItem[] = [
    {
        name: "Search",
        href: "/",
        icon: HomeIcon,
        color: "border-accent",
        description: "Open a stock, ETF or index chart",
    },
    {
        name: "Data Viewer",
        href: "/data-viewer",
        icon: TableCellsIcon,
        color: "border-desk-policy",
        description: "Events, analysis and imports",
    },
];

const quickCharts: { code: string; label: string }[] = [
    { code: "000001.SH", label: "上证指数" },
    { code: "399006.SZ", label: "创业板指" },
    { code: "600519.SH", label: "贵州茅台" },
    { code: "512880.SH", label: "证券ETF" },
];

export function Sidebar() {
    const pathname = usePathname();
    const router = useRouter();
    const [code, setCode] = useState("");

    const openChart = (e: React.FormEvent) => {
        e.preventDefault();
        const trimmed = code.trim();
        if (!trimmed) return;
        router.push(`/kline/${encodeURIComponent(trimmed)}`);
        setCode("");
    };

    return (
        <aside className="fixed left-0 top-0 bottom-0 w-64 bg-background-secondary border-r border-card-border">
            <div className="flex flex-col h-full">
                {/* Logo */}
                <div className="p-4 border-b border-card-border">
                    <Link href="/" className="flex items-center gap-3">
                        <div className="w-10 h-10 rounded-lg bg-gradient-to-br from-accent to-accent-light flex items-center justify-center">
                            <ChartBarIcon className="w-6 h-6 text-white" />
                        </div>
                        <div>
                            <h1 className="text-sm font-bold text-foreground">Policy K-line</h1>
                            <p className="text-2xs text-foreground-muted">Policy events on A-share charts</p>
                        </div>
                    </Link>
                </div>

                {/* Quick open */}
                <form onSubmit={openChart} className="p-3 border-b border-card-border">
                    <div className="flex items-center gap-2 px-3 py-2 rounded-lg bg-background-tertiary">
                        <MagnifyingGlassIcon className="w-4 h-4 text-foreground-muted" />
                        <input
                            value={code}
                            onChange={(e) => setCode(e.target.value)}
                            placeholder="600519 or 000001.SH"
                            className="flex-1 bg-transparent text-sm text-foreground placeholder:text-foreground-muted outline-none"
                        />
                    </div>
                </form>

                <nav className="flex-1 py-4 overflow-y-auto">
                    <div className="px-3 mb-2">
                        <span className="text-2xs font-medium text-foreground-muted uppercase tracking-wider">
                            Pages
                        </span>
                    </div>

                    {navItems.map((item) => {
                        const isActive = pathname === item.href;
                        const Icon = item.icon;

                        return (
                            <Link
                                key={item.name}
                                href={item.href}
                                className={`nav-tab ${isActive ? `nav-tab-active ${item.color}` : ""}`}
                            >
                                <Icon className="w-5 h-5 flex-shrink-0" />
                                <div className="flex-1 min-w-0">
                                    <span className="block truncate">{item.name}</span>
                                    <span className="block text-2xs text-foreground-muted truncate">
                                        {item.description}
                                    </span>
                                </div>
                            </Link>
                        );
                    })}

                    <div className="px-3 mt-6 mb-2">
                        <span className="text-2xs font-medium text-foreground-muted uppercase tracking-wider">
                            Charts
                        </span>
                    </div>

                    {quickCharts.map((item) => {
                        const href = `/kline/${item.code}`;
                        const isActive = pathname === href;

                        return (
                            <Link
                                key={item.code}
                                href={href}
                                className={`nav-tab ${isActive ? "nav-tab-active border-desk-chart" : ""}`}
                            >
                                <span className="font-mono text-xs w-20 flex-shrink-0">{item.code}</span>
                                <span className="truncate">{item.label}</span>
                            </Link>
                        );
                    })}
                </nav>
            </div>
        </aside>
    );
}
