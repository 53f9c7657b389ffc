export { InMemoryAnalyticsMetadataProvider } from './in-memory-analytics-metadata-provider.js';
