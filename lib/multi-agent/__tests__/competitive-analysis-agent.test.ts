import { describe, it, expect } from "vitest";

import {
  ANALYSIS_NARRATIVE,
  BUSINESS,
  COMPETITORS,
  MARKET_GAP_LINES,
  ScriptedCompletionClient,
  WEAKNESS_LINES,
} from "../../__tests__/fixtures";
import { CompetitiveAnalysisAgent } from "../agents/competitive-analysis-agent";
import { createInitialState } from "../state";

function stateWithCompetitors() {
  return { ...createInitialState(BUSINESS, "description"), competitors: COMPETITORS };
}

describe("CompetitiveAnalysisAgent", () => {
  it("keeps the narrative and extracts gaps and weaknesses", async () => {
    const llm = new ScriptedCompletionClient([ANALYSIS_NARRATIVE]);
    const agent = new CompetitiveAnalysisAgent(llm);

    const update = await agent.run(stateWithCompetitors());

    expect(update.competitiveAnalysis).toBe(ANALYSIS_NARRATIVE);
    expect(update.marketGaps).toEqual(MARKET_GAP_LINES.slice(0, 5));
    expect(update.competitorWeaknesses).toEqual(WEAKNESS_LINES.slice(0, 5));
    expect(update.agentStatus).toEqual({ analysis: "complete" });
    expect(update.messages).toEqual([
      "[Analysis Agent] Starting competitive analysis",
      "[Analysis Agent] Generated comprehensive analysis",
    ]);
  });

  it("passes the competitor list to the model", async () => {
    const llm = new ScriptedCompletionClient([ANALYSIS_NARRATIVE]);
    const agent = new CompetitiveAnalysisAgent(llm);

    await agent.run(stateWithCompetitors());

    expect(llm.prompts[0]).toContain(`Business: ${BUSINESS}`);
    expect(llm.prompts[0]).toContain('"name": "HelpLoop"');
    expect(llm.prompts[0]).toContain("## Key Strategic Insights");
  });

  it("uses the default lists when the narrative has no matching headings", async () => {
    const llm = new ScriptedCompletionClient(["The market is crowded and growing quickly."]);
    const agent = new CompetitiveAnalysisAgent(llm);

    const update = await agent.run(stateWithCompetitors());

    expect(update.marketGaps).toEqual(["Underserved market segments", "Feature gaps in existing solutions"]);
    expect(update.competitorWeaknesses).toEqual(["Pricing complexity", "Limited features"]);
  });

  it("still runs with an empty competitor list", async () => {
    const llm = new ScriptedCompletionClient([ANALYSIS_NARRATIVE]);
    const agent = new CompetitiveAnalysisAgent(llm);

    const update = await agent.run(createInitialState(BUSINESS, "description"));

    expect(llm.prompts[0]).toContain("Competitors:\n[]");
    expect(update.competitiveAnalysis).toBe(ANALYSIS_NARRATIVE);
  });
});
