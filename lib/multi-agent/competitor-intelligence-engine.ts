import { StateGraph, END, START } from "@langchain/langgraph";

import { createCompletionClient, type CompletionClient } from '../completion';
import type { EnvConfig } from '../env';
import { FirecrawlClient, type SearchClient } from '../firecrawl';
import { ComparisonStrategyAgent } from './agents/comparison-strategy-agent';
import { CompetitiveAnalysisAgent } from './agents/competitive-analysis-agent';
import { CompetitorDiscoveryAgent } from './agents/competitor-discovery-agent';
import { BaseAgent } from './base-agent';
import {
  CompetitorState,
  CompetitorStateAnnotation,
  CompetitorStateUpdate,
  createInitialState,
} from './state';
import { AgentEventCallback, AgentStatusMap, AnalysisMode, StageName } from './types';

// Clients shared by every run; each run owns its own state
export interface EngineDependencies {
  llm: CompletionClient;
  search: SearchClient;
}

interface GraphConfig {
  configurable?: {
    eventCallback?: AgentEventCallback;
  };
}

export interface PipelineAgents {
  discovery: BaseAgent;
  analysis: BaseAgent;
  comparison: BaseAgent;
}

// Marks a stage as working in the shared state before its agent runs
function stageStartNode(stage: StageName) {
  return async (): Promise<CompetitorStateUpdate> => {
    const agentStatus: Partial<AgentStatusMap> = {};
    agentStatus[stage] = 'working';
    return { agentStatus };
  };
}

function stageNode(agent: BaseAgent) {
  return async (state: CompetitorState, config?: GraphConfig): Promise<CompetitorStateUpdate> =>
    agent.run(state, config?.configurable?.eventCallback);
}

// Fixed sequential flow: discovery -> analysis -> comparison, each stage
// preceded by a node that records it as working
export function buildCompetitorGraph(agents: PipelineAgents) {
  const workflow = new StateGraph(CompetitorStateAnnotation)
    .addNode("discovery_start", stageStartNode('discovery'))
    .addNode("discovery", stageNode(agents.discovery))
    .addNode("analysis_start", stageStartNode('analysis'))
    .addNode("analysis", stageNode(agents.analysis))
    .addNode("comparison_start", stageStartNode('comparison'))
    .addNode("comparison", stageNode(agents.comparison))
    .addEdge(START, "discovery_start")
    .addEdge("discovery_start", "discovery")
    .addEdge("discovery", "analysis_start")
    .addEdge("analysis_start", "analysis")
    .addEdge("analysis", "comparison_start")
    .addEdge("comparison_start", "comparison")
    .addEdge("comparison", END);

  return workflow.compile();
}

export class CompetitorIntelligenceEngine {
  private agents: PipelineAgents;
  private graph: ReturnType<typeof buildCompetitorGraph>;

  constructor(dependencies: EngineDependencies) {
    this.agents = {
      discovery: new CompetitorDiscoveryAgent(dependencies.llm, dependencies.search),
      analysis: new CompetitiveAnalysisAgent(dependencies.llm),
      comparison: new ComparisonStrategyAgent(dependencies.llm),
    };
    this.graph = buildCompetitorGraph(this.agents);
  }

  /**
   * Runs discovery, analysis and comparison in order and returns the final
   * shared state. Search and extraction problems degrade to fallbacks inside
   * the agents; inference failures reject the returned promise.
   */
  async run(
    userInput: string,
    mode: AnalysisMode = 'description',
    onEvent?: AgentEventCallback
  ): Promise<CompetitorState> {
    const initialState = createInitialState(userInput, mode);

    const config: GraphConfig = {
      configurable: {
        eventCallback: onEvent,
      },
    };

    return this.graph.invoke(initialState, config);
  }

  getAgents(): Array<{ id: string; name: string; description: string }> {
    return [this.agents.discovery, this.agents.analysis, this.agents.comparison].map(agent => agent.getProfile());
  }
}

/**
 * Builds an engine backed by OpenAI (through LangChain) and Firecrawl search,
 * configured from the environment.
 */
export function createDefaultEngine(env: EnvConfig): CompetitorIntelligenceEngine {
  return new CompetitorIntelligenceEngine({
    llm: createCompletionClient(env),
    search: new FirecrawlClient(env.firecrawlApiKey, { timeoutMs: env.search.timeoutMs }),
  });
}
