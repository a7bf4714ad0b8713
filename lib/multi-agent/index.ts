// Multi-Agent System Exports
export * from './types';
export * from './state';
export * from './schemas';
export * from './structured-output';
export * from './sections';
export * from './base-agent';
export * from './competitor-intelligence-engine';

// Specialized Agents
export * from './agents/competitor-discovery-agent';
export * from './agents/competitive-analysis-agent';
export * from './agents/comparison-strategy-agent';
