import { CONFIG } from '../config';
import { HarvestPipeline } from '../services/pipeline';
import { BrowserSnapshotSource } from '../services/snapshotSource';
import { StorageService, readFrontier, resolveFrontierPath } from '../services/storage';
import { HarvestSummary } from '../types/listing';

export type HarvestMode =
  | { kind: 'single'; url: string }
  | { kind: 'batch' }
  | { kind: 'sample' };

/**
 * `--batch` wins over `--url <url>`; with neither, the built-in sample URL is used
 */
export function parseHarvestArgs(args: string[]): HarvestMode {
  if (args.includes('--batch')) {
    return { kind: 'batch' };
  }

  const inline = args.find(arg => arg.startsWith('--url='));
  if (inline && inline.length > '--url='.length) {
    return { kind: 'single', url: inline.slice('--url='.length) };
  }

  const urlIndex = args.indexOf('--url');
  if (urlIndex !== -1 && args[urlIndex + 1]) {
    return { kind: 'single', url: args[urlIndex + 1] };
  }

  return { kind: 'sample' };
}

/**
 * Locate and read the frontier file. Returns null (after logging) when it is missing, invalid or empty.
 */
export async function loadBatchUrls(candidates: readonly string[]): Promise<string[] | null> {
  const frontierPath = await resolveFrontierPath(candidates);
  if (!frontierPath) {
    console.error(`Could not find ${CONFIG.paths.frontierFile} in any expected location`);
    return null;
  }
  console.log(`Found frontier file at: ${frontierPath}`);

  let urls: string[];
  try {
    urls = await readFrontier(frontierPath);
  } catch (error) {
    console.error('Could not read frontier file:', error instanceof Error ? error.message : error);
    return null;
  }

  if (urls.length === 0) {
    console.error(`No URLs found in ${frontierPath}`);
    return null;
  }

  console.log(`Found ${urls.length} URLs to process`);
  return urls;
}

/**
 * Harvest community pages in single, batch or sample mode.
 * Returns null when batch mode has no usable frontier.
 */
async function runHarvest(
  mode: HarvestMode,
  frontierCandidates: readonly string[] = CONFIG.paths.frontierCandidates
): Promise<HarvestSummary | null> {
  console.log(`Starting harvest (${mode.kind} mode)...`);

  const storage = new StorageService(CONFIG.paths.outputDir);
  await storage.ensureDirectories();

  let urls: string[];
  switch (mode.kind) {
    case 'batch': {
      const loaded = await loadBatchUrls(frontierCandidates);
      if (!loaded) {
        console.error('❌ Batch harvest aborted: no frontier to process');
        return null;
      }
      urls = loaded;
      break;
    }
    case 'single':
      urls = [mode.url];
      break;
    default:
      urls = [CONFIG.sampleUrls[0]];
      break;
  }

  const pipeline = new HarvestPipeline(() => new BrowserSnapshotSource(), storage, {
    origin: CONFIG.site.origin,
    pageSettleMs: CONFIG.timing.pageSettleMs,
    detailSettleMs: CONFIG.timing.detailSettleMs,
    requestIntervalMs: CONFIG.timing.requestIntervalMs,
  });

  const summary = await pipeline.runBatch(urls);

  console.log('\n=== HARVEST SUMMARY ===');
  console.log(`Total URLs: ${summary.total}`);
  console.log(`Harvested: ${summary.harvested}`);
  console.log(`Skipped (already harvested): ${summary.skipped}`);
  console.log(`Failed: ${summary.failed}`);
  console.log('=======================\n');

  return summary;
}

if (require.main === module) {
  const mode = parseHarvestArgs(process.argv.slice(2));

  runHarvest(mode)
    .then(() => {
      console.log('Harvest completed');
      process.exit(0);
    })
    .catch((error) => {
      console.error('Harvest failed:', error);
      process.exit(1);
    });
}

export { runHarvest };
