import { promises as fs } from 'fs';
import path from 'path';
import { load } from 'cheerio';
import { LOCATORS } from '../extractors/locators';
import { lastPathSegment, normalizeUrl } from '../extractors/fieldExtractors';
import { SnapshotSource, withSession } from './snapshotSource';

export interface DiscoveryOptions {
  origin: string;
  landingUrl: string;
  settleMs: number;
  /** Directory receiving copies of the landing and region pages; omit to skip saving */
  snapshotDir?: string;
}

/**
 * Region (city) links on the landing page, absolute and in first-seen order
 */
export function extractRegionLinks(html: string, origin: string): string[] {
  const $ = load(html);
  const links: string[] = [];

  for (const anchor of $(LOCATORS.discovery.regionLink).toArray()) {
    const href = $(anchor).attr('href');
    if (!href) continue;

    const url = normalizeUrl(href, origin);
    if (url && !links.includes(url)) {
      links.push(url);
    }
  }

  return links;
}

/**
 * Community detail links inside the community cards of a region page
 */
export function extractCommunityLinks(html: string, origin: string): string[] {
  const $ = load(html);
  const links: string[] = [];

  for (const card of $(LOCATORS.discovery.communityCard).toArray()) {
    for (const anchor of $(card).find(LOCATORS.discovery.detailLink).toArray()) {
      const href = $(anchor).attr('href');
      const url = href ? normalizeUrl(href, origin) : null;
      if (url) {
        links.push(url);
      }
    }
  }

  return links;
}

/**
 * Two-level link discovery: landing page -> region pages -> community detail pages
 */
export class FrontierDiscovery {
  constructor(
    private readonly createSource: () => SnapshotSource,
    private readonly options: DiscoveryOptions
  ) {}

  /**
   * Level 1: region links from the landing page. A failed fetch yields an empty list.
   */
  async discoverRegions(): Promise<string[]> {
    try {
      return await withSession(this.createSource(), async source => {
        console.log(`Fetching landing page ${this.options.landingUrl}...`);
        const html = await source.fetchPage(this.options.landingUrl, this.options.settleMs);
        await this.saveSnapshot('landing', html);

        const links = extractRegionLinks(html, this.options.origin);
        links.forEach(link => console.log(`Found region link: ${link}`));
        console.log(`Total region links found: ${links.length}`);
        return links;
      });
    } catch (error) {
      console.error('Error getting region links:', error instanceof Error ? error.message : error);
      return [];
    }
  }

  /**
   * Level 2: community links from every region page. A region that fails is skipped.
   */
  async discoverCommunities(regionUrls: string[]): Promise<string[]> {
    const found = new Set<string>();

    try {
      await withSession(this.createSource(), async source => {
        for (const regionUrl of regionUrls) {
          console.log(`Processing region: ${regionUrl}`);
          try {
            const html = await source.fetchPage(regionUrl, this.options.settleMs);
            await this.saveSnapshot(`region_${lastPathSegment(regionUrl) || 'index'}`, html);

            for (const link of extractCommunityLinks(html, this.options.origin)) {
              if (!found.has(link)) {
                found.add(link);
                console.log(`Found community link: ${link}`);
              }
            }
          } catch (error) {
            console.error(`Error processing region ${regionUrl}:`, error instanceof Error ? error.message : error);
          }
        }
      });
    } catch (error) {
      console.error('Error getting community links:', error instanceof Error ? error.message : error);
    }

    return [...found];
  }

  /**
   * Full discovery. Stops after Level 1 when no region links were found.
   */
  async run(): Promise<string[]> {
    const regions = await this.discoverRegions();
    console.log(`Found ${regions.length} region links`);

    if (regions.length === 0) {
      console.error('No region links found');
      return [];
    }

    const communities = await this.discoverCommunities(regions);
    console.log(`Found ${communities.length} community links`);
    return communities;
  }

  private async saveSnapshot(name: string, html: string): Promise<void> {
    if (!this.options.snapshotDir) return;
    await fs.mkdir(this.options.snapshotDir, { recursive: true });
    await fs.writeFile(path.join(this.options.snapshotDir, `${name}.html`), html, 'utf-8');
  }
}
