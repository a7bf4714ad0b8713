import type { CompletionClient } from '../../completion';
import { COMPARISON_CONFIG } from '../../config';
import { AgentRun, BaseAgent, describeBusiness } from '../base-agent';
import { FeatureMatrixSchema } from '../schemas';
import type { CompetitorState, CompetitorStateUpdate } from '../state';
import { parseStructured } from '../structured-output';
import { AnalysisMode, Competitor, FeatureMatrix } from '../types';

export function createPlaceholderMatrix(): FeatureMatrix {
  return {
    features: [
      {
        name: 'AI Features',
        yourOpportunity: 'Build',
        competitors: { 'Competitor A': 'Partial' },
        strategicValue: 'Differentiation',
        implementationComplexity: 'Medium',
      },
    ],
  };
}

export class ComparisonStrategyAgent extends BaseAgent {
  constructor(llm: CompletionClient) {
    super(
      'comparison',
      'Comparison Agent',
      'Builds the feature comparison matrix and strategic recommendations',
      llm
    );
  }

  getSystemPrompt(): string {
    return `You are a Comparison Agent creating structured competitor comparisons and strategy.

Be specific, actionable, and prioritized.`;
  }

  async executeTask(state: CompetitorState, run: AgentRun): Promise<CompetitorStateUpdate> {
    const { userInput, analysisMode, competitors, competitiveAnalysis } = state;

    run.post('Creating feature comparison');

    // Phase 1: feature comparison matrix
    run.thinking('Building feature comparison matrix...');
    const featureComparison = await this.buildFeatureMatrix(userInput, analysisMode, competitors, run);
    run.post(`Created comparison with ${featureComparison.features.length} features`);

    // Phase 2: strategic recommendations
    run.thinking('Generating strategic recommendations...');
    const strategicRecommendations = await this.generateRecommendations(
      userInput,
      analysisMode,
      competitiveAnalysis,
      featureComparison
    );
    run.post('Generated strategic recommendations');

    return {
      featureComparison,
      strategicRecommendations,
    };
  }

  private async buildFeatureMatrix(
    userInput: string,
    mode: AnalysisMode,
    competitors: Competitor[],
    run: AgentRun
  ): Promise<FeatureMatrix> {
    const response = await this.callLLM(`${describeBusiness(userInput, mode)}

Competitors:
${JSON.stringify(competitors, null, 2)}

Create a feature comparison matrix with ${COMPARISON_CONFIG.MIN_FEATURES}-${COMPARISON_CONFIG.MAX_FEATURES} key features.

Return ONLY valid JSON:
{
  "features": [
    {
      "name": "Feature Name",
      "yourOpportunity": "Yes|No|Build",
      "competitors": {
        "Competitor A": "Yes|No|Partial|Premium",
        "Competitor B": "Yes|No|Partial|Premium"
      },
      "strategicValue": "Why this feature matters",
      "implementationComplexity": "Low|Medium|High"
    }
  ]
}`);

    const result = parseStructured(response, 'object', FeatureMatrixSchema);
    if (result.ok) {
      return result.value;
    }

    // Same asymmetry as competitor ranking: nothing found vs. found but broken
    if (result.error.reason === 'not-found') {
      run.thinking('Comparison returned no feature matrix');
      return { features: [] };
    }
    run.thinking(`Feature matrix could not be parsed (${result.error.message}), using placeholder feature`);
    return createPlaceholderMatrix();
  }

  private async generateRecommendations(
    userInput: string,
    mode: AnalysisMode,
    competitiveAnalysis: string,
    featureComparison: FeatureMatrix
  ): Promise<string> {
    const items = COMPARISON_CONFIG.ITEMS_PER_SECTION;

    return this.callLLM(`${describeBusiness(userInput, mode)}

Competitive Analysis Summary:
${competitiveAnalysis.slice(0, COMPARISON_CONFIG.ANALYSIS_CONTEXT_LENGTH)}

Feature Comparison:
${JSON.stringify(featureComparison, null, 2)}

Provide strategic recommendations in these categories:

## 🎯 Immediate Actions (0-3 months)
${items} specific high-impact actions to take now.

## 📈 Strategic Initiatives (3-12 months)
${items} longer-term strategic moves.

## 🏰 Competitive Moats to Build
${items} sustainable competitive advantages to develop.

## 💎 Market Opportunities to Pursue
${items} untapped market opportunities based on competitor gaps.`);
  }
}
