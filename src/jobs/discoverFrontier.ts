import path from 'path';
import { CONFIG } from '../config';
import { FrontierDiscovery } from '../services/frontierDiscovery';
import { BrowserSnapshotSource } from '../services/snapshotSource';
import { writeFrontier } from '../services/storage';

/**
 * Discover every community detail page and write the frontier file.
 * Returns the discovered links; nothing is written when there are none.
 */
async function discoverFrontier(
  outputPath: string = path.join(CONFIG.paths.discoveryDir, CONFIG.paths.frontierFile)
): Promise<string[]> {
  console.log('Starting frontier discovery...');

  const discovery = new FrontierDiscovery(() => new BrowserSnapshotSource(), {
    origin: CONFIG.site.origin,
    landingUrl: CONFIG.site.landingUrl,
    settleMs: CONFIG.timing.pageSettleMs,
    snapshotDir: CONFIG.paths.discoveryDir,
  });

  const links = await discovery.run();
  if (links.length === 0) {
    console.error('❌ No community links found - frontier not written');
    return [];
  }

  await writeFrontier(outputPath, links);
  console.log(`✅ Discovery completed with ${links.length} community links`);
  return links;
}

if (require.main === module) {
  discoverFrontier()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      console.error('Discovery failed:', error);
      process.exit(1);
    });
}

export { discoverFrontier };
