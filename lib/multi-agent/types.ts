// Multi-Agent System Types for Competitor Intelligence
export type AnalysisMode = 'url' | 'description';

export type StageName = 'discovery' | 'analysis' | 'comparison';

export type AgentStatus = 'pending' | 'working' | 'complete';

export type AgentStatusMap = Record<StageName, AgentStatus>;

export const STAGE_ORDER: readonly StageName[] = ['discovery', 'analysis', 'comparison'];

// Discovery outputs
export interface RawCompetitor {
  name: string;
  url: string;
  description: string;
  source: string;
}

export type MarketPosition = 'leader' | 'challenger' | 'emerging';

export interface Competitor {
  name: string;
  url: string;
  description: string;
  category: string;
  relevanceScore: number; // integer 0-10
  marketPosition: MarketPosition;
  relevanceReason: string;
}

// Comparison outputs
export type OpportunityLevel = 'Yes' | 'No' | 'Build';

export type FeatureSupport = 'Yes' | 'No' | 'Partial' | 'Premium';

export type ImplementationComplexity = 'Low' | 'Medium' | 'High';

export interface Feature {
  name: string;
  yourOpportunity: OpportunityLevel;
  // Keyed by whatever competitor names the model chose
  competitors: Record<string, FeatureSupport>;
  strategicValue: string;
  implementationComplexity: ImplementationComplexity;
}

export interface FeatureMatrix {
  features: Feature[];
}

// Agent events, delivered per run through the graph config
export type AgentEventType =
  | 'status-changed'
  | 'message'
  | 'progress'
  | 'agent-error';

export interface AgentEvent {
  type: AgentEventType;
  agentId: StageName;
  timestamp: Date;
  message?: string;
  status?: AgentStatus;
  data?: unknown;
}

export type AgentEventCallback = (event: AgentEvent) => void;
