import { HomePlanEnrichment, HomeSiteEnrichment } from '../types/listing';
import { extractHomePlanDetails, extractHomeSiteDetails } from '../extractors/detailPages';
import { SnapshotSource } from './snapshotSource';
import { StorageService, outputKey } from './storage';

/**
 * Fetches the detail page of a child entity and extracts its extra fields
 */
export interface ChildEnricher {
  enrichHomeSite(url: string): Promise<HomeSiteEnrichment | null>;
  enrichHomePlan(url: string): Promise<HomePlanEnrichment | null>;
}

export interface EnrichmentOptions {
  origin: string;
  settleMs: number;
}

/**
 * Runs the fetch -> snapshot -> extract -> delete cycle for home sites and home plans.
 * A failure for one entity yields null and never reaches the caller.
 */
export class EnrichmentController implements ChildEnricher {
  constructor(
    private readonly source: SnapshotSource,
    private readonly storage: StorageService,
    private readonly options: EnrichmentOptions
  ) {}

  async enrichHomeSite(url: string): Promise<HomeSiteEnrichment | null> {
    const result = await this.enrich('homesite', url, html => extractHomeSiteDetails(html, this.options.origin));
    if (result) {
      console.log(`Found ${result.images.length} images for home site ${url}`);
    }
    return result;
  }

  async enrichHomePlan(url: string): Promise<HomePlanEnrichment | null> {
    const result = await this.enrich('plan', url, html => extractHomePlanDetails(html, this.options.origin));
    if (result) {
      console.log(`Added ${result.includedFeatures.length} included features for plan ${url}`);
    }
    return result;
  }

  private async enrich<T>(kind: string, url: string, extract: (html: string) => T): Promise<T | null> {
    const snapshotName = `${kind}_${outputKey(url)}`;

    try {
      const html = await this.source.fetchPage(url, this.options.settleMs);
      await this.storage.saveSnapshot(snapshotName, html);
      return extract(html);
    } catch (error) {
      console.error(`Error processing ${kind} page ${url}:`, error instanceof Error ? error.message : error);
      return null;
    } finally {
      if (await this.storage.removeSnapshot(snapshotName)) {
        console.log(`Deleted snapshot: ${this.storage.snapshotPath(snapshotName)}`);
      }
    }
  }
}
