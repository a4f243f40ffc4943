/**
 * Stock industry types
 */

export interface StockIndustry {
    stock_code: string;
    stock_name: string | null;
    industries: string[];
    analysis_summary: string | null;
    confidence_score: number | null;
    updated_at: string | null;
}

export interface IndustryAnalysis {
    industries: string[];
    analysis_summary: string;
    confidence_score: number;
}

/** Descriptive profile fed into the industry prompt */
export interface StockProfile {
    stockCode: string;
    stockName: string;
    description: string;
    businessScope: string;
    mainBusiness: string;
    industryClassification: string;
}
