/**
 * Prompt construction for policy → industry analysis.
 */

import type { ContentQuality } from './types';

export const POLICY_SYSTEM_PROMPT =
    '你是一个专业的金融政策分析师，擅长分析政策新闻对股票市场的影响。请根据政策内容分析相关的行业、板块和个股。';

export const CONTENT_LIMITS = {
    fullThreshold: 500,
    partialThreshold: 100,
    /** Minimum length for the full-content prompt variant */
    promptThreshold: 50,
    maxPromptContent: 3000,
} as const;

const TRUNCATION_NOTE = '...(内容过长已截断)';

export function classifyContentQuality(content: string): ContentQuality {
    if (content.length > CONTENT_LIMITS.fullThreshold) return 'full';
    if (content.length > CONTENT_LIMITS.partialThreshold) return 'partial';
    return 'title_only';
}

function analysisRequest(summaryInstruction: string, confidenceNote: string, defaultConfidence: string): string {
    return `
请从以下几个方面进行分析：
1. 相关行业：列出可能受到影响的主要行业（最多5个）
2. 影响程度：评估对股市的整体影响程度（正面/负面/中性）
3. 分析摘要：${summaryInstruction}
4. 置信度：对分析结果的置信度评分（0-1之间${confidenceNote}）

请以JSON格式返回结果：
{
    "industries": ["行业1", "行业2", ...],
    "impact_type": "正面/负面/中性",
    "analysis_summary": "分析摘要",
    "confidence_score": ${defaultConfidence}
}
`;
}

export interface PromptInput {
    title: string;
    content: string;
    eventType: string | null;
    sourceUrl: string | null;
}

export function hasFullContent(content: string): boolean {
    return content.length > CONTENT_LIMITS.promptThreshold;
}

export function truncateContent(content: string): string {
    return content.length > CONTENT_LIMITS.maxPromptContent
        ? content.slice(0, CONTENT_LIMITS.maxPromptContent) + TRUNCATION_NOTE
        : content;
}

export function buildAnalysisPrompt(input: PromptInput): string {
    const eventType = input.eventType || '未知';

    if (hasFullContent(input.content)) {
        return `
请分析以下政策对中国股市的影响：

标题：${input.title}
事件类型：${eventType}

完整内容：
${truncateContent(input.content)}

${analysisRequest('基于完整政策内容，详细说明政策的主要影响点和逻辑', '', '0.8')}
`;
    }

    return `
请分析以下政策对中国股市的影响：

标题：${input.title}
内容：${input.content || '无详细内容'}
事件类型：${eventType}
原文链接：${input.sourceUrl || '无'}

注意：由于缺乏详细政策内容，请基于标题进行初步分析，并在置信度评分中体现这一限制。

${analysisRequest('简要说明政策的主要影响点和逻辑', '，由于缺乏详细内容应适当降低', '0.5')}
`;
}
