import type { CompletionClient } from '../completion';
import type { CompetitorState, CompetitorStateUpdate } from './state';
import {
  AgentEvent,
  AgentEventCallback,
  AgentStatus,
  AgentStatusMap,
  AnalysisMode,
  StageName,
} from './types';

export function describeBusiness(userInput: string, mode: AnalysisMode): string {
  return mode === 'url' ? `Company website: ${userInput}` : `Business: ${userInput}`;
}

export interface AgentProfile {
  id: StageName;
  name: string;
  description: string;
}

/**
 * Per-run bookkeeping for one agent invocation. Collects the progress
 * messages the agent appends to the shared state and forwards everything to
 * the run's event callback, if any.
 */
export class AgentRun {
  readonly messages: string[] = [];
  private profile: AgentProfile;
  private onEvent?: AgentEventCallback;

  constructor(profile: AgentProfile, onEvent?: AgentEventCallback) {
    this.profile = profile;
    this.onEvent = onEvent;
  }

  // Appends a progress note to the shared message log
  post(message: string, data?: unknown): void {
    const entry = `[${this.profile.name}] ${message}`;
    this.messages.push(entry);
    this.emit({ type: 'message', message: entry, data });
  }

  // Progress that is shown to the caller but not recorded in state
  thinking(message: string, data?: unknown): void {
    this.emit({ type: 'progress', message, data });
  }

  setStatus(status: AgentStatus): void {
    this.emit({ type: 'status-changed', status, message: `${this.profile.name}: ${status}` });
  }

  fail(error: unknown): void {
    this.emit({
      type: 'agent-error',
      message: `${this.profile.name} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      data: error,
    });
  }

  private emit(event: Omit<AgentEvent, 'agentId' | 'timestamp'>): void {
    this.onEvent?.({
      ...event,
      agentId: this.profile.id,
      timestamp: new Date(),
    });
  }
}

export abstract class BaseAgent {
  protected llm: CompletionClient;
  protected agent: AgentProfile;

  constructor(agentId: StageName, name: string, description: string, llm: CompletionClient) {
    this.llm = llm;
    this.agent = { id: agentId, name, description };
  }

  // Abstract methods that must be implemented by specialized agents
  abstract executeTask(state: CompetitorState, run: AgentRun): Promise<CompetitorStateUpdate>;
  abstract getSystemPrompt(): string;

  /**
   * Runs the agent against the current state and returns the state update:
   * the agent's own fields, its progress messages and its `complete` status.
   * Inference failures are reported as an `agent-error` event and rethrown
   * unchanged.
   */
  async run(state: CompetitorState, onEvent?: AgentEventCallback): Promise<CompetitorStateUpdate> {
    const run = new AgentRun(this.agent, onEvent);
    run.setStatus('working');

    let update: CompetitorStateUpdate;
    try {
      update = await this.executeTask(state, run);
    } catch (error) {
      run.fail(error);
      throw error;
    }

    run.setStatus('complete');
    const agentStatus: Partial<AgentStatusMap> = {};
    agentStatus[this.agent.id] = 'complete';

    return {
      ...update,
      messages: run.messages,
      agentStatus,
    };
  }

  protected async callLLM(task: string): Promise<string> {
    return this.llm.complete(`${this.getSystemPrompt()}\n\n${task}`);
  }

  public getProfile(): AgentProfile {
    return { ...this.agent };
  }
}
