/**
 * Prompts for classifying a security into industries.
 *
 * Each security type gets its own analyst persona and request wording;
 * the reply format is shared.
 */

import type { StockType } from '@/lib/kline/types';
import knownStocks from './data/known-stocks.json';
import { isRecord, readString } from '@/lib/shared/type-guards';
import type { StockProfile } from './types';

const KNOWN_STOCKS: Record<string, unknown> = knownStocks;

export const INDUSTRY_MAX_TOKENS = 1000;
export const INDUSTRY_TIMEOUT_MS = 30_000;

const SYSTEM_PROMPTS: Record<StockType, string> = {
    etf: '你是一个专业的ETF基金分析师，擅长分析A股市场的ETF基金行业分类。请基于ETF的详细信息（包括名称、描述、投资范围等），准确识别其跟踪的行业板块。你需要仔细分析提供的所有信息，给出详细的判断依据。',
    index: '你是一个专业的指数分析师，擅长分析A股市场的指数构成。请基于指数的详细信息（包括名称、描述、成分股特征等），准确识别其覆盖的主要行业领域。你需要仔细分析提供的所有信息，给出详细的判断依据。',
    stock: '你是一个专业的股票行业分析师，擅长分析A股市场的上市公司行业分类。请基于公司的详细信息（包括名称、描述、经营范围、主营业务等），准确识别其主营业务所属行业。你需要仔细分析提供的所有信息，给出详细的判断依据。',
};

interface RequestWording {
    intro: string;
    steps: [string, string];
    summaryHint: string;
}

const REQUEST_WORDING: Record<StockType, RequestWording> = {
    etf: {
        intro: '请基于以下ETF基金的详细信息，分析其所跟踪的行业板块：',
        steps: [
            '基于ETF的名称、描述和相关信息，识别其主要投资的行业领域',
            '分析该ETF覆盖的细分行业',
        ],
        summaryHint: '基于ETF详细信息的分析说明，包括判断依据',
    },
    index: {
        intro: '请基于以下指数的详细信息，分析其所覆盖的行业板块：',
        steps: [
            '基于指数的名称、描述和相关信息，识别其主要覆盖的行业领域',
            '分析该指数包含的主要行业构成',
        ],
        summaryHint: '基于指数详细信息的分析说明，包括判断依据',
    },
    stock: {
        intro: '请基于以下上市公司的详细信息，分析其所属的行业分类：',
        steps: [
            '基于公司的名称、描述、经营范围、主营业务等信息，识别其主营业务所属的行业',
            '分析该公司涉及的细分行业领域',
        ],
        summaryHint: '基于公司详细信息的分析说明，包括判断依据',
    },
};

export function getIndustrySystemPrompt(stockType: StockType): string {
    return SYSTEM_PROMPTS[stockType];
}

function genericDescription(stockCode: string, stockName: string, stockType: StockType): string {
    switch (stockType) {
        case 'etf':
            return `ETF基金 ${stockCode}（${stockName}），跟踪特定指数或行业板块的交易型开放式指数基金。`;
        case 'index':
            return `股票指数 ${stockCode}（${stockName}），反映特定市场或行业股票价格变动的指标。`;
        default:
            return `上市公司 ${stockCode}（${stockName}），在A股市场公开交易的股份有限公司。`;
    }
}

/**
 * Profile from the known-securities table, or a generic description by type
 */
export function buildStockProfile(stockCode: string, stockName: string, stockType: StockType): StockProfile {
    const known = KNOWN_STOCKS[stockCode];

    if (isRecord(known)) {
        return {
            stockCode,
            stockName,
            description: readString(known, 'description') ?? '',
            businessScope: readString(known, 'businessScope') ?? '',
            mainBusiness: readString(known, 'mainBusiness') ?? '',
            industryClassification: readString(known, 'industryClassification') ?? '',
        };
    }

    return {
        stockCode,
        stockName,
        description: genericDescription(stockCode, stockName, stockType),
        businessScope: '',
        mainBusiness: '',
        industryClassification: '',
    };
}

export function formatProfile(profile: StockProfile): string {
    return `
股票基本信息：
- 股票代码：${profile.stockCode}
- 股票名称：${profile.stockName}
- 公司描述：${profile.description}
- 经营范围：${profile.businessScope}
- 主营业务：${profile.mainBusiness}
- 行业分类：${profile.industryClassification}
`;
}

export function buildIndustryPrompt(profile: StockProfile, stockType: StockType): string {
    const wording = REQUEST_WORDING[stockType];

    return `
${wording.intro}

${formatProfile(profile)}

分析要求：
1. ${wording.steps[0]}
2. ${wording.steps[1]}
3. 考虑A股市场的行业分类标准
4. 提供详细的分析说明，说明判断依据
5. 给出分析的置信度评分(0-1之间)

请以JSON格式返回结果：
{
    "industries": ["主要行业1", "细分行业1", "相关行业1"],
    "analysis_summary": "${wording.summaryHint}",
    "confidence_score": 0.85
}

注意：
- industries数组应包含3-5个相关行业关键词
- 行业名称要准确、具体
- 分析说明要详细，包含判断依据
- 置信度要基于信息完整度客观评估
`;
}
