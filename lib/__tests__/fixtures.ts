import type { CompletionClient } from "../completion";
import type { SearchClient, SearchHit } from "../firecrawl";
import { createInitialState, type CompetitorState } from "../multi-agent/state";
import type { AgentEvent, Competitor, FeatureMatrix } from "../multi-agent/types";

// ── Test doubles ─────────────────────────────────────────────────────────────

/**
 * Returns the scripted responses in order. An `Error` entry rejects that call.
 */
export class ScriptedCompletionClient implements CompletionClient {
  readonly prompts: string[] = [];
  private responses: Array<string | Error>;

  constructor(responses: Array<string | Error>) {
    this.responses = [...responses];
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error("No scripted response left");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export class StubSearchClient implements SearchClient {
  readonly calls: Array<{ query: string; maxResults: number }> = [];
  private respond: (query: string, callIndex: number) => SearchHit[] | Error;

  constructor(respond: (query: string, callIndex: number) => SearchHit[] | Error) {
    this.respond = respond;
  }

  async search(query: string, maxResults: number): Promise<SearchHit[]> {
    const callIndex = this.calls.length;
    this.calls.push({ query, maxResults });
    const result = this.respond(query, callIndex);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

export function recordEvents(): { events: AgentEvent[]; onEvent: (event: AgentEvent) => void } {
  const events: AgentEvent[] = [];
  return { events, onEvent: (event) => events.push(event) };
}

// ── Data ─────────────────────────────────────────────────────────────────────

export const BUSINESS = "AI-powered customer support chatbot for e-commerce";

const SEARCH_LABELS = ["Alpha", "Bravo", "Charlie", "Delta"];

export function hitsFor(callIndex: number, count = 3): SearchHit[] {
  const label = SEARCH_LABELS[callIndex] ?? `Search${callIndex}`;
  return Array.from({ length: count }, (_, i) => ({
    title: `${label}-${i + 1}`,
    url: `https://${label.toLowerCase()}-${i + 1}.example`,
    content: `${label} result ${i + 1} snippet`,
  }));
}

export const PLANNED_QUERIES = [
  "customer support chatbot software",
  "e-commerce live chat alternatives",
  "AI helpdesk for online stores",
  "emerging conversational commerce startups",
];

export const COMPETITORS: Competitor[] = [
  {
    name: "ChatDesk",
    url: "chatdesk.example",
    description: "Helpdesk with AI replies for online shops",
    category: "Customer support",
    relevanceScore: 9,
    marketPosition: "leader",
    relevanceReason: "Same buyer and use case",
  },
  {
    name: "ShopBot",
    url: "shopbot.example",
    description: "Chatbot builder for storefronts",
    category: "Conversational commerce",
    relevanceScore: 8,
    marketPosition: "challenger",
    relevanceReason: "Overlapping chatbot features",
  },
  {
    name: "ReplyPilot",
    url: "replypilot.example",
    description: "Automated email and chat replies",
    category: "Support automation",
    relevanceScore: 7,
    marketPosition: "challenger",
    relevanceReason: "Automates the same tickets",
  },
  {
    name: "CartChat",
    url: "cartchat.example",
    description: "Chat widget focused on cart recovery",
    category: "Conversational commerce",
    relevanceScore: 6,
    marketPosition: "emerging",
    relevanceReason: "Adjacent checkout use case",
  },
  {
    name: "HelpLoop",
    url: "helploop.example",
    description: "Knowledge base with a chat assistant",
    category: "Self-service support",
    relevanceScore: 6,
    marketPosition: "emerging",
    relevanceReason: "Alternative self-service approach",
  },
];

export const MARKET_GAP_LINES = [
  "- Most competitors focus on enterprise retailers over small shops",
  "- Few tools offer native returns automation in the chat flow",
  "- Multilingual support is limited to a handful of languages",
  "- Pricing is opaque and tied to conversation volume tiers",
  "- Integrations with headless commerce stacks are rare",
  "- Proactive order-status messaging is mostly missing",
];

export const WEAKNESS_LINES = [
  "- ChatDesk requires weeks of onboarding before going live",
  "- ShopBot answers drift when the product catalog changes",
  "- ReplyPilot has no native Shopify app",
  "- CartChat cannot hand over to a human agent",
  "- HelpLoop reporting stops at ticket counts",
  "- All of them charge extra for analytics",
];

export const ANALYSIS_NARRATIVE = `# Competitive Analysis

## Market Positioning & Gaps
${MARKET_GAP_LINES.join("\n")}
Short line

## Competitor Weaknesses
${WEAKNESS_LINES.join("\n")}

## Pricing & Business Model Insights
Seat-based pricing dominates the category.

## Recommended Features
Returns automation and order tracking in chat.

## Growth Opportunities
Mid-market merchants moving off legacy helpdesks.

## Key Strategic Insights
Win on time-to-value.`;

export const FEATURE_MATRIX: FeatureMatrix = {
  features: [
    {
      name: "Order tracking in chat",
      yourOpportunity: "Build",
      competitors: { ChatDesk: "Yes", ShopBot: "Partial" },
      strategicValue: "Most frequent support question",
      implementationComplexity: "Medium",
    },
    {
      name: "Multilingual replies",
      yourOpportunity: "Yes",
      competitors: { ChatDesk: "Premium", ShopBot: "No" },
      strategicValue: "Opens cross-border merchants",
      implementationComplexity: "Low",
    },
  ],
};

export const RECOMMENDATIONS = `## 🎯 Immediate Actions (0-3 months)
- Ship order tracking in chat

## 📈 Strategic Initiatives (3-12 months)
- Build a returns automation flow`;

export function fencedJson(value: unknown): string {
  return "```json\n" + JSON.stringify(value, null, 2) + "\n```";
}

/**
 * Model responses for one full run, in call order: query planning, ranking,
 * analysis narrative, feature matrix, recommendations.
 */
export function happyPathResponses(): string[] {
  return [
    `Here are the searches I would run:\n${JSON.stringify(PLANNED_QUERIES)}`,
    `Top competitors:\n${fencedJson(COMPETITORS)}`,
    ANALYSIS_NARRATIVE,
    fencedJson(FEATURE_MATRIX),
    RECOMMENDATIONS,
  ];
}

export function makeFinalState(overrides: Partial<CompetitorState> = {}): CompetitorState {
  return {
    ...createInitialState(BUSINESS, "description"),
    searchQueries: PLANNED_QUERIES.slice(0, 3),
    competitors: COMPETITORS,
    competitiveAnalysis: ANALYSIS_NARRATIVE,
    marketGaps: MARKET_GAP_LINES.slice(0, 5),
    competitorWeaknesses: WEAKNESS_LINES.slice(0, 5),
    featureComparison: FEATURE_MATRIX,
    strategicRecommendations: RECOMMENDATIONS,
    messages: ["[Discovery Agent] Starting competitor discovery"],
    agentStatus: { discovery: "complete", analysis: "complete", comparison: "complete" },
    ...overrides,
  };
}
