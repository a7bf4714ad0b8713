import type { AgentEvent, AgentEventCallback, AgentEventType, StageName } from '../lib/multi-agent/types';

const AGENT_ICONS: Record<StageName, string> = {
  discovery: '🕷️',
  analysis: '🧠',
  comparison: '⚖️',
};

const EVENT_ICONS: Record<AgentEventType, string> = {
  'status-changed': '🚀',
  message: '📊',
  progress: '📝',
  'agent-error': '❌',
};

export function formatAgentEvent(event: AgentEvent): string {
  const icon = event.type === 'status-changed' && event.status === 'complete' ? '✅' : EVENT_ICONS[event.type];
  const indent = event.type === 'progress' ? '      ' : '   ';
  return `${indent}${AGENT_ICONS[event.agentId]} ${icon} ${event.message ?? event.type}`;
}

/**
 * Event callback that prints agent activity as it happens. The `agent-error`
 * line goes to stderr.
 */
export function createProgressReporter(
  write: (line: string) => void = line => console.log(line),
  writeError: (line: string) => void = line => console.error(line)
): AgentEventCallback {
  return (event: AgentEvent) => {
    const line = formatAgentEvent(event);
    if (event.type === 'agent-error') {
      writeError(line);
    } else {
      write(line);
    }
  };
}
