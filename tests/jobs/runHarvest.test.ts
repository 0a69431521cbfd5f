import { promises as fs } from 'fs';
import path from 'path';
import { loadBatchUrls, parseHarvestArgs, runHarvest } from '../../src/jobs/runHarvest';
import { HarvestPipeline } from '../../src/services/pipeline';
import { HarvestSummary } from '../../src/types/listing';
import { makeTempDir } from '../helpers';

const SUNSET_RIDGE = 'https://homes.example.com/state/tx/austin/sunset-ridge';
const OAK_HOLLOW = 'https://homes.example.com/state/tx/dallas/oak-hollow';

describe('runHarvest', () => {
  let dir: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = await makeTempDir();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('parseHarvestArgs', () => {
    it('should default to the sample URL', () => {
      expect(parseHarvestArgs([])).toEqual({ kind: 'sample' });
    });

    it('should accept a URL as a separate or inline argument', () => {
      expect(parseHarvestArgs(['--url', SUNSET_RIDGE])).toEqual({ kind: 'single', url: SUNSET_RIDGE });
      expect(parseHarvestArgs([`--url=${SUNSET_RIDGE}`])).toEqual({ kind: 'single', url: SUNSET_RIDGE });
    });

    it('should prefer batch mode over a URL', () => {
      expect(parseHarvestArgs(['--url', SUNSET_RIDGE, '--batch'])).toEqual({ kind: 'batch' });
    });

    it('should ignore a URL flag without a value', () => {
      expect(parseHarvestArgs(['--url'])).toEqual({ kind: 'sample' });
      expect(parseHarvestArgs(['--url='])).toEqual({ kind: 'sample' });
    });
  });

  describe('loadBatchUrls', () => {
    it('should read the first frontier file found', async () => {
      const frontier = path.join(dir, 'community_links.json');
      await fs.writeFile(frontier, JSON.stringify([SUNSET_RIDGE, OAK_HOLLOW]));

      const urls = await loadBatchUrls([path.join(dir, 'missing.json'), frontier]);

      expect(urls).toEqual([SUNSET_RIDGE, OAK_HOLLOW]);
      expect(console.log).toHaveBeenCalledWith(`Found frontier file at: ${frontier}`);
      expect(console.log).toHaveBeenCalledWith('Found 2 URLs to process');
    });

    it('should return null when no frontier file exists', async () => {
      await expect(loadBatchUrls([path.join(dir, 'missing.json')])).resolves.toBeNull();
      expect(console.error).toHaveBeenCalledWith('Could not find community_links.json in any expected location');
    });

    it('should return null for an empty frontier', async () => {
      const frontier = path.join(dir, 'community_links.json');
      await fs.writeFile(frontier, '[]');

      await expect(loadBatchUrls([frontier])).resolves.toBeNull();
      expect(console.error).toHaveBeenCalledWith(`No URLs found in ${frontier}`);
    });

    it('should return null for an invalid frontier', async () => {
      const frontier = path.join(dir, 'community_links.json');
      await fs.writeFile(frontier, JSON.stringify({ urls: [SUNSET_RIDGE] }));

      await expect(loadBatchUrls([frontier])).resolves.toBeNull();
      expect(console.error).toHaveBeenCalledWith(
        'Could not read frontier file:',
        `Frontier file ${frontier} must be an array of absolute URLs`
      );
    });
  });

  describe('runHarvest', () => {
    const summary: HarvestSummary = { total: 2, harvested: 1, skipped: 1, failed: 0 };

    it('should harvest every frontier URL in batch mode', async () => {
      const frontier = path.join(dir, 'community_links.json');
      await fs.writeFile(frontier, JSON.stringify([SUNSET_RIDGE, OAK_HOLLOW]));
      const runBatch = jest.spyOn(HarvestPipeline.prototype, 'runBatch').mockResolvedValue(summary);

      await expect(runHarvest({ kind: 'batch' }, [frontier])).resolves.toEqual(summary);
      expect(runBatch).toHaveBeenCalledWith([SUNSET_RIDGE, OAK_HOLLOW]);
      expect(console.log).toHaveBeenCalledWith('Skipped (already harvested): 1');
    });

    it('should abort batch mode without a frontier', async () => {
      const runBatch = jest.spyOn(HarvestPipeline.prototype, 'runBatch');

      await expect(runHarvest({ kind: 'batch' }, [path.join(dir, 'missing.json')])).resolves.toBeNull();
      expect(runBatch).not.toHaveBeenCalled();
    });

    it('should harvest a single URL', async () => {
      const runBatch = jest.spyOn(HarvestPipeline.prototype, 'runBatch').mockResolvedValue(summary);

      await runHarvest({ kind: 'single', url: OAK_HOLLOW });

      expect(runBatch).toHaveBeenCalledWith([OAK_HOLLOW]);
    });

    it('should harvest the first sample URL by default', async () => {
      const runBatch = jest.spyOn(HarvestPipeline.prototype, 'runBatch').mockResolvedValue(summary);

      await runHarvest({ kind: 'sample' });

      expect(runBatch).toHaveBeenCalledTimes(1);
      expect(runBatch.mock.calls[0][0]).toHaveLength(1);
    });
  });
});
