// =============================================================================
// Application Services - Barrel Export
// =============================================================================

export * from './RecordBuilder.js';
export * from './SimilaritySearchService.js';
export * from './StatsService.js';
export * from './ChatHistoryService.js';
