import type { CompetitorState } from './multi-agent/state';
import type { AgentStatusMap, AnalysisMode, Competitor, FeatureMatrix } from './multi-agent/types';

const RULE = '='.repeat(60);
const THIN_RULE = '-'.repeat(60);
const FEATURE_PREVIEW_COUNT = 5;

// Shape written by the CLI's --output flag
export interface JsonReport {
  input: string;
  mode: AnalysisMode;
  competitors: Competitor[];
  analysis: string;
  comparison: FeatureMatrix;
  recommendations: string;
}

// Shape returned by POST /api/analyze
export interface AnalysisResponse {
  competitors: Competitor[];
  competitive_analysis: string;
  market_gaps: string[];
  competitor_weaknesses: string[];
  feature_comparison: FeatureMatrix;
  strategic_recommendations: string;
  agent_messages: string[];
  agent_status: AgentStatusMap;
}

export function toJsonReport(state: CompetitorState): JsonReport {
  return {
    input: state.userInput,
    mode: state.analysisMode,
    competitors: state.competitors,
    analysis: state.competitiveAnalysis,
    comparison: state.featureComparison,
    recommendations: state.strategicRecommendations,
  };
}

export function toAnalysisResponse(state: CompetitorState): AnalysisResponse {
  return {
    competitors: state.competitors,
    competitive_analysis: state.competitiveAnalysis,
    market_gaps: state.marketGaps,
    competitor_weaknesses: state.competitorWeaknesses,
    feature_comparison: state.featureComparison,
    strategic_recommendations: state.strategicRecommendations,
    agent_messages: state.messages,
    agent_status: state.agentStatus,
  };
}

/**
 * Plain-text rendering of a finished run for terminals.
 */
export function formatResults(state: CompetitorState): string {
  let result = `\n📊 FINAL RESULTS\n${RULE}\n`;

  result += `\n🎯 DISCOVERED COMPETITORS\n${THIN_RULE}\n`;
  if (state.competitors.length === 0) {
    result += `\nNo competitors identified.\n`;
  }
  state.competitors.forEach((competitor, index) => {
    result += `\n${index + 1}. ${competitor.name}\n`;
    result += `   URL: ${competitor.url || 'N/A'}\n`;
    result += `   Category: ${competitor.category || 'N/A'}\n`;
    result += `   Position: ${competitor.marketPosition}\n`;
    result += `   Score: ${competitor.relevanceScore}/10\n`;
    result += `   Reason: ${competitor.relevanceReason || 'N/A'}\n`;
  });

  result += `\n\n📈 COMPETITIVE ANALYSIS\n${THIN_RULE}\n`;
  result += `${state.competitiveAnalysis}\n`;

  const features = state.featureComparison.features;
  result += `\n\n⚖️ FEATURE COMPARISON\n${THIN_RULE}\n`;
  result += `Total features analyzed: ${features.length}\n`;
  features.slice(0, FEATURE_PREVIEW_COUNT).forEach(feature => {
    result += `\n• ${feature.name}\n`;
    result += `  Your Opportunity: ${feature.yourOpportunity}\n`;
    result += `  Strategic Value: ${feature.strategicValue}\n`;
    result += `  Complexity: ${feature.implementationComplexity}\n`;
  });

  result += `\n\n💡 STRATEGIC RECOMMENDATIONS\n${THIN_RULE}\n`;
  result += `${state.strategicRecommendations}\n`;

  result += `\n\n📡 AGENT MESSAGES\n${THIN_RULE}\n`;
  state.messages.forEach(message => {
    result += `  ${message}\n`;
  });

  result += `\n${RULE}\n`;
  return result;
}
