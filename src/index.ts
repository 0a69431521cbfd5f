export { CONFIG } from './config';
export * from './types/listing';
export { LOCATORS } from './extractors/locators';
export * from './extractors/fieldExtractors';
export { extractHomePlanDetails, extractHomeSiteDetails } from './extractors/detailPages';
export { BrowserSnapshotSource, withSession } from './services/snapshotSource';
export type { SnapshotSource } from './services/snapshotSource';
export { StorageService, outputKey, readFrontier, resolveFrontierPath, writeFrontier } from './services/storage';
export { EnrichmentController } from './services/enrichment';
export type { ChildEnricher } from './services/enrichment';
export { assembleCommunity, pickFallbackImage } from './services/recordAssembler';
export { FrontierDiscovery, extractCommunityLinks, extractRegionLinks } from './services/frontierDiscovery';
export { HarvestPipeline } from './services/pipeline';
export type { PipelineOptions } from './services/pipeline';
export { discoverFrontier } from './jobs/discoverFrontier';
export { parseHarvestArgs, runHarvest } from './jobs/runHarvest';
