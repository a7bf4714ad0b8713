export * from './multi-agent';
export * from './completion';
export * from './firecrawl';
export * from './env';
export * from './config';
export * from './report';
