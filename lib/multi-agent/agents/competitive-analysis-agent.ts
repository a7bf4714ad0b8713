import type { CompletionClient } from '../../completion';
import { ANALYSIS_CONFIG } from '../../config';
import { AgentRun, BaseAgent, describeBusiness } from '../base-agent';
import { extractCompetitorWeaknesses, extractMarketGaps } from '../sections';
import type { CompetitorState, CompetitorStateUpdate } from '../state';

export class CompetitiveAnalysisAgent extends BaseAgent {
  constructor(llm: CompletionClient) {
    super(
      'analysis',
      'Analysis Agent',
      'Turns the competitor list into a competitive intelligence report',
      llm
    );
  }

  getSystemPrompt(): string {
    return `You are an Analysis Agent specialized in competitive intelligence.

When analyzing a competitive landscape, focus on:
1. Where competitors are positioned and which gaps they leave open
2. Concrete weaknesses and vulnerabilities of each competitor
3. Pricing strategies and business models
4. Features worth building and growth opportunities

Always provide detailed, specific analysis with actionable insights.`;
  }

  async executeTask(state: CompetitorState, run: AgentRun): Promise<CompetitorStateUpdate> {
    const { userInput, analysisMode, competitors } = state;

    run.post('Starting competitive analysis');
    run.thinking('Performing deep analysis...', { competitors: competitors.length });

    const competitiveAnalysis = await this.callLLM(`${describeBusiness(userInput, analysisMode)}

Competitors:
${JSON.stringify(competitors, null, 2)}

Provide a comprehensive competitive analysis with these sections:

## ${ANALYSIS_CONFIG.MARKET_GAPS_HEADING}
Analyze where competitors are positioned and what market gaps exist.

## ${ANALYSIS_CONFIG.WEAKNESSES_HEADING}
Identify specific weaknesses and vulnerabilities of each competitor.

## Pricing & Business Model Insights
Analyze pricing strategies and business models.

## Recommended Features
Based on gaps, what features should this business build?

## Growth Opportunities
What market opportunities exist based on competitive landscape?

## Key Strategic Insights
Most important strategic takeaways.`);

    const marketGaps = extractMarketGaps(competitiveAnalysis);
    const competitorWeaknesses = extractCompetitorWeaknesses(competitiveAnalysis);

    run.post('Generated comprehensive analysis', {
      marketGaps: marketGaps.length,
      competitorWeaknesses: competitorWeaknesses.length,
    });

    return {
      competitiveAnalysis,
      marketGaps,
      competitorWeaknesses,
    };
  }
}
