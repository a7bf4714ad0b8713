import type { CompletionClient } from '../../completion';
import type { SearchClient } from '../../firecrawl';
import { DISCOVERY_CONFIG } from '../../config';
import { AgentRun, BaseAgent, describeBusiness } from '../base-agent';
import { CompetitorListSchema, SearchQueriesSchema } from '../schemas';
import type { CompetitorState, CompetitorStateUpdate } from '../state';
import { parseStructured } from '../structured-output';
import { AnalysisMode, Competitor, RawCompetitor } from '../types';

export function createPlaceholderCompetitor(): Competitor {
  return {
    name: 'Competitor A',
    url: 'competitor-a.com',
    description: 'Leading market player',
    category: 'SaaS',
    relevanceScore: 8,
    marketPosition: 'leader',
    relevanceReason: 'Direct competitor',
  };
}

export class CompetitorDiscoveryAgent extends BaseAgent {
  private searchClient: SearchClient;

  constructor(llm: CompletionClient, searchClient: SearchClient) {
    super(
      'discovery',
      'Discovery Agent',
      'Plans web searches, collects candidate competitors and ranks the most relevant ones',
      llm
    );
    this.searchClient = searchClient;
  }

  getSystemPrompt(): string {
    return `You are a Discovery Agent specialized in finding the competitors of a business.

Your expertise includes:
- Planning diverse web searches that surface direct and adjacent competitors
- Separating real competitors from directories, listicles and unrelated pages
- Judging how relevant each competitor is and where it sits in the market`;
  }

  async executeTask(state: CompetitorState, run: AgentRun): Promise<CompetitorStateUpdate> {
    const { userInput, analysisMode } = state;

    run.post('Starting competitor discovery');

    // Phase 1: plan search queries
    run.thinking('Planning search strategies...');
    const searchQueries = await this.planSearchQueries(userInput, analysisMode, run);
    run.post(`Planned ${searchQueries.length} search strategies`, { searchQueries });

    // Phase 2: execute web searches, one at a time
    const rawCompetitors = await this.executeSearches(searchQueries, userInput, run);
    run.post(`Found ${rawCompetitors.length} potential competitors`);

    // Phase 3: rank and filter
    run.thinking('Ranking and filtering competitors...');
    const competitors = await this.rankCompetitors(rawCompetitors, userInput, analysisMode, run);
    run.post(`Selected top ${competitors.length} competitors`);

    return {
      searchQueries,
      rawCompetitors,
      competitors,
    };
  }

  private async planSearchQueries(userInput: string, mode: AnalysisMode, run: AgentRun): Promise<string[]> {
    const response = await this.callLLM(`${describeBusiness(userInput, mode)}

Create ${DISCOVERY_CONFIG.TARGET_QUERY_COUNT} diverse search queries to find competitors. Consider:
- Direct competitors (same product/service)
- Adjacent competitors (similar market)
- Alternative solutions
- Emerging players

Return ONLY a JSON array of search queries:
["query1", "query2", "query3", "query4"]`);

    const result = parseStructured(response, 'array', SearchQueriesSchema);
    if (!result.ok) {
      run.thinking(`Could not read planned queries (${result.error.message}), using generic queries`);
      return [...DISCOVERY_CONFIG.FALLBACK_QUERIES];
    }
    return result.value;
  }

  private async executeSearches(queries: string[], userInput: string, run: AgentRun): Promise<RawCompetitor[]> {
    const plannedSearches = queries.slice(0, DISCOVERY_CONFIG.MAX_SEARCHES);
    run.thinking(`Executing ${plannedSearches.length} web searches...`);

    const rawCompetitors: RawCompetitor[] = [];

    for (const [index, query] of plannedSearches.entries()) {
      run.thinking(`Search ${index + 1}: ${query}`);

      try {
        const hits = await this.searchClient.search(`${query} ${userInput}`, DISCOVERY_CONFIG.RESULTS_PER_SEARCH);
        for (const hit of hits) {
          rawCompetitors.push({
            name: hit.title || 'Unknown',
            url: hit.url,
            description: hit.content.slice(0, DISCOVERY_CONFIG.DESCRIPTION_CHAR_LIMIT),
            source: 'web_search',
          });
        }
      } catch (error) {
        run.post(`Search ${index + 1} failed for "${query}": ${error instanceof Error ? error.message : 'Unknown error'}`);
      }
    }

    return rawCompetitors;
  }

  private async rankCompetitors(
    rawCompetitors: RawCompetitor[],
    userInput: string,
    mode: AnalysisMode,
    run: AgentRun
  ): Promise<Competitor[]> {
    const candidates = rawCompetitors.slice(0, DISCOVERY_CONFIG.MAX_CANDIDATES_TO_RANK);

    const response = await this.callLLM(`You are analyzing competitors for the following business.
${describeBusiness(userInput, mode)}

Raw competitor data:
${JSON.stringify(candidates, null, 2)}

Select the top ${DISCOVERY_CONFIG.TOP_COMPETITORS} most relevant competitors, merge duplicates and enhance the data.

Return ONLY a JSON array:
[
  {
    "name": "Company Name",
    "url": "company.com",
    "description": "One-sentence description",
    "category": "Market category",
    "relevanceScore": 8,
    "marketPosition": "leader|challenger|emerging",
    "relevanceReason": "Why this is a direct competitor"
  }
]`);

    const result = parseStructured(response, 'array', CompetitorListSchema);
    if (result.ok) {
      return result.value;
    }

    // No JSON at all yields an empty list; malformed JSON yields a placeholder
    if (result.error.reason === 'not-found') {
      run.thinking('Ranking returned no competitor list');
      return [];
    }
    run.thinking(`Ranking output could not be parsed (${result.error.message}), using placeholder competitor`);
    return [createPlaceholderCompetitor()];
  }
}
