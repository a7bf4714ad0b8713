import { Annotation } from "@langchain/langgraph";

import {
  AgentStatus,
  AgentStatusMap,
  AnalysisMode,
  Competitor,
  FeatureMatrix,
  RawCompetitor,
  STAGE_ORDER,
} from './types';

const STATUS_RANK: Record<AgentStatus, number> = {
  pending: 0,
  working: 1,
  complete: 2,
};

// Statuses only move forward: pending -> working -> complete
export function advanceStatus(current: AgentStatusMap, update: Partial<AgentStatusMap> | undefined): AgentStatusMap {
  if (!update) return current;
  const next: AgentStatusMap = { ...current };
  for (const stage of STAGE_ORDER) {
    const status = update[stage];
    if (status && STATUS_RANK[status] >= STATUS_RANK[next[stage]]) {
      next[stage] = status;
    }
  }
  return next;
}

export function createPendingStatus(): AgentStatusMap {
  return {
    discovery: 'pending',
    analysis: 'pending',
    comparison: 'pending',
  };
}

// Shared blackboard threaded through the three agents
export const CompetitorStateAnnotation = Annotation.Root({
  // Input fields
  userInput: Annotation<string>({
    reducer: (x, y) => y ?? x,
    default: () => ""
  }),
  analysisMode: Annotation<AnalysisMode>({
    reducer: (x, y) => y ?? x,
    default: (): AnalysisMode => 'description'
  }),

  // Agent communications, append-only
  messages: Annotation<string[]>({
    reducer: (existing: string[], update: string[] | undefined) => {
      if (!update) return existing;
      return [...existing, ...update];
    },
    default: () => []
  }),

  // Discovery outputs
  searchQueries: Annotation<string[]>({
    reducer: (x, y) => y ?? x,
    default: () => []
  }),
  rawCompetitors: Annotation<RawCompetitor[]>({
    reducer: (x, y) => y ?? x,
    default: () => []
  }),
  competitors: Annotation<Competitor[]>({
    reducer: (x, y) => y ?? x,
    default: () => []
  }),

  // Analysis outputs
  competitiveAnalysis: Annotation<string>({
    reducer: (x, y) => y ?? x,
    default: () => ""
  }),
  marketGaps: Annotation<string[]>({
    reducer: (x, y) => y ?? x,
    default: () => []
  }),
  competitorWeaknesses: Annotation<string[]>({
    reducer: (x, y) => y ?? x,
    default: () => []
  }),

  // Comparison outputs
  featureComparison: Annotation<FeatureMatrix>({
    reducer: (x, y) => y ?? x,
    default: () => ({ features: [] })
  }),
  strategicRecommendations: Annotation<string>({
    reducer: (x, y) => y ?? x,
    default: () => ""
  }),

  // Metadata
  agentStatus: Annotation<AgentStatusMap, Partial<AgentStatusMap> | undefined>({
    reducer: advanceStatus,
    default: createPendingStatus
  }),
});

export type CompetitorState = typeof CompetitorStateAnnotation.State;
export type CompetitorStateUpdate = typeof CompetitorStateAnnotation.Update;

export function createInitialState(userInput: string, analysisMode: AnalysisMode): CompetitorState {
  return {
    userInput,
    analysisMode,
    messages: [],
    searchQueries: [],
    rawCompetitors: [],
    competitors: [],
    competitiveAnalysis: "",
    marketGaps: [],
    competitorWeaknesses: [],
    featureComparison: { features: [] },
    strategicRecommendations: "",
    agentStatus: createPendingStatus(),
  };
}
