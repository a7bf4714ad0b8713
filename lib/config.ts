// Competitor Discovery Configuration
export const DISCOVERY_CONFIG = {
  // Query Planning
  TARGET_QUERY_COUNT: 4,         // Number of search queries requested from the model
  FALLBACK_QUERIES: ['competitors', 'alternatives', 'similar products'],

  // Search Execution
  MAX_SEARCHES: 3,               // Hard cap on web searches per run
  RESULTS_PER_SEARCH: 3,         // Results requested per search query
  DESCRIPTION_CHAR_LIMIT: 200,   // Raw competitor descriptions are cut to this length
  SEARCH_TIMEOUT: 30000,         // Timeout for a single search call (ms)

  // Ranking
  MAX_CANDIDATES_TO_RANK: 10,    // Raw competitors sent to the ranking prompt
  TOP_COMPETITORS: 5,            // Competitors the model is asked to keep
} as const;

// Competitive Analysis Configuration
export const ANALYSIS_CONFIG = {
  MARKET_GAPS_HEADING: 'Market Positioning & Gaps',
  WEAKNESSES_HEADING: 'Competitor Weaknesses',
  SECTION_MARKER: '##',          // Level-2 heading marker that ends a section
  MIN_LINE_LENGTH: 20,           // Section lines must be longer than this (untrimmed)
  MAX_SECTION_ITEMS: 5,          // Items kept per extracted section
  DEFAULT_MARKET_GAPS: ['Underserved market segments', 'Feature gaps in existing solutions'],
  DEFAULT_WEAKNESSES: ['Pricing complexity', 'Limited features'],
} as const;

// Comparison & Strategy Configuration
export const COMPARISON_CONFIG = {
  MIN_FEATURES: 10,
  MAX_FEATURES: 12,
  ANALYSIS_CONTEXT_LENGTH: 2000, // Prefix of the competitive analysis given to the strategy prompt
  ITEMS_PER_SECTION: '4-5',
} as const;

// Model Configuration
export const MODEL_CONFIG = {
  MODEL: "gpt-4o",
  TEMPERATURE: 0,                // Model temperature (0 = deterministic)
  MAX_TOKENS: 3000,
} as const;

// Server Configuration
export const SERVER_CONFIG = {
  PORT: 8000,
  HOST: "0.0.0.0",
  SERVICE_NAME: "Competitor Intelligence",
  REQUEST_PREVIEW_LENGTH: 50,    // Characters of user input echoed in request logs
} as const;
