import { HarvestOutcome, HarvestSummary, RandomSource } from '../types/listing';
import { delay } from '../utils/delay';
import { EnrichmentController } from './enrichment';
import { assembleCommunity } from './recordAssembler';
import { SnapshotSource, withSession } from './snapshotSource';
import { StorageService, outputKey } from './storage';

export interface PipelineOptions {
  origin: string;
  pageSettleMs: number;
  detailSettleMs: number;
  requestIntervalMs: number;
  random?: RandomSource;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sequential harvester over a list of community URLs.
 *
 * A URL whose record already exists is skipped without fetching; a URL that fails is
 * logged and counted, and the batch moves on.
 */
export class HarvestPipeline {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly createSource: () => SnapshotSource,
    private readonly storage: StorageService,
    private readonly options: PipelineOptions
  ) {
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Fetch, assemble and persist one community page
   */
  async harvestUrl(url: string): Promise<HarvestOutcome> {
    const key = outputKey(url);

    try {
      if (await this.storage.hasRecord(key)) {
        console.log(`Record already exists: ${this.storage.recordPath(key)}, skipping...`);
        return 'skipped';
      }

      console.log(`Processing URL: ${url}`);
      await this.storage.ensureDirectories();

      const community = await withSession(this.createSource(), async source => {
        const html = await source.fetchPage(url, this.options.pageSettleMs);
        const snapshot = await this.storage.saveSnapshot(`community_${key}`, html);
        console.log(`Snapshot saved to: ${snapshot}`);

        const enricher = new EnrichmentController(source, this.storage, {
          origin: this.options.origin,
          settleMs: this.options.detailSettleMs,
        });

        return assembleCommunity(html, url, {
          origin: this.options.origin,
          enricher,
          random: this.options.random,
          now: this.options.now,
        });
      });

      await this.storage.writeRecord(key, community);
      return 'harvested';
    } catch (error) {
      console.error(`Failed to process URL ${url}:`, error instanceof Error ? error.message : error);
      return 'failed';
    }
  }

  /**
   * Harvest every URL in order, pausing between fetched pages
   */
  async runBatch(urls: string[]): Promise<HarvestSummary> {
    const summary: HarvestSummary = { total: urls.length, harvested: 0, skipped: 0, failed: 0 };

    for (let i = 0; i < urls.length; i++) {
      console.log(`Processing URL ${i + 1}/${urls.length}`);
      const outcome = await this.harvestUrl(urls[i]);
      summary[outcome]++;

      const isLast = i === urls.length - 1;
      if (outcome !== 'skipped' && !isLast) {
        await this.sleep(this.options.requestIntervalMs);
      }
    }

    return summary;
  }
}
