import { promises as fs } from 'fs';
import path from 'path';
import {
  FrontierDiscovery,
  extractCommunityLinks,
  extractRegionLinks,
} from '../../src/services/frontierDiscovery';
import { FakeSnapshotSource, ORIGIN, makeTempDir } from '../helpers';

const LANDING_URL = `${ORIGIN}/homes`;
const AUSTIN = `${ORIGIN}/state/tx/austin`;
const DALLAS = `${ORIGIN}/state/tx/dallas`;
const HOUSTON = `${ORIGIN}/state/tx/houston`;

const X = `${ORIGIN}/state/tx/austin/sunset-ridge`;
const Y = `${ORIGIN}/state/tx/austin/cedar-park`;
const Z = `${ORIGIN}/state/tx/dallas/oak-hollow`;

const LANDING_HTML = `
  <nav>
    <a class="city-link" href="/state/tx/austin">Austin</a>
    <a class="city-link" href="/state/tx/dallas">Dallas</a>
    <a class="city-link" href="/state/tx/austin">Austin</a>
    <a class="city-link" href="${HOUSTON}">Houston</a>
    <a class="city-link">No link</a>
    <a class="state-link" href="/state/tx">Texas</a>
  </nav>`;

function regionPage(...links: string[]): string {
  return links
    .map(link => `
      <div class="community-horizontal">
        <a class="button--blue--solid" href="${link}">View Community</a>
        <a class="button--outline" href="/contact">Contact</a>
      </div>`)
    .join('\n');
}

describe('frontier discovery', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('extractRegionLinks', () => {
    it('should return absolute region links in first-seen order without duplicates', () => {
      expect(extractRegionLinks(LANDING_HTML, ORIGIN)).toEqual([AUSTIN, DALLAS, HOUSTON]);
    });

    it('should drop an unresolvable link and keep the rest', () => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const html = '<a class="city-link" href="//">Broken</a><a class="city-link" href="/state/tx/austin">Austin</a>';

      expect(extractRegionLinks(html, ORIGIN)).toEqual([AUSTIN]);
    });
  });

  describe('extractCommunityLinks', () => {
    it('should return only detail links inside community cards', () => {
      const html = `${regionPage('/state/tx/austin/sunset-ridge', Y)}
        <a class="button--blue--solid" href="/state/tx/austin/outside-card">Outside</a>`;

      expect(extractCommunityLinks(html, ORIGIN)).toEqual([X, Y]);
    });

    it('should drop an unresolvable community link', () => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      expect(extractCommunityLinks(regionPage('//', Z), ORIGIN)).toEqual([Z]);
    });
  });

  describe('FrontierDiscovery', () => {
    let sources: FakeSnapshotSource[];

    beforeEach(() => {
      sources = [];
      jest.spyOn(console, 'log').mockImplementation(() => undefined);
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    function discoveryFor(pages: Record<string, string>, failing: string[] = [], snapshotDir?: string) {
      const createSource = () => {
        const source = new FakeSnapshotSource(pages, failing);
        sources.push(source);
        return source;
      };
      return new FrontierDiscovery(createSource, { origin: ORIGIN, landingUrl: LANDING_URL, settleMs: 0, snapshotDir });
    }

    it('should collect community links across regions in order without duplicates', async () => {
      const discovery = discoveryFor({
        [LANDING_URL]: LANDING_HTML,
        [AUSTIN]: regionPage(X, Y, X),
        [DALLAS]: regionPage(Y, Z),
        [HOUSTON]: '<p>No communities yet</p>',
      });

      await expect(discovery.run()).resolves.toEqual([X, Y, Z]);
    });

    it('should skip a region that fails and keep the others', async () => {
      const discovery = discoveryFor(
        {
          [LANDING_URL]: LANDING_HTML,
          [DALLAS]: regionPage(Z),
          [HOUSTON]: regionPage(Y),
        },
        [AUSTIN]
      );

      const links = await discovery.run();

      expect(links).toEqual([Z, Y]);
      expect(console.error).toHaveBeenCalledWith(
        `Error processing region ${AUSTIN}:`,
        `net::ERR_CONNECTION_RESET at ${AUSTIN}`
      );
    });

    it('should stop after the landing page when no regions are found', async () => {
      const discovery = discoveryFor({ [LANDING_URL]: '<p>Maintenance</p>' });

      const links = await discovery.run();

      expect(links).toEqual([]);
      expect(sources).toHaveLength(1);
      expect(sources[0].fetched).toEqual([LANDING_URL]);
      expect(console.error).toHaveBeenCalledWith('No region links found');
    });

    it('should return no regions when the landing page cannot be fetched', async () => {
      const discovery = discoveryFor({}, [LANDING_URL]);

      await expect(discovery.discoverRegions()).resolves.toEqual([]);
      expect(sources[0].cleanedUp).toBe(1);
    });

    it('should use one session per level and always clean it up', async () => {
      const discovery = discoveryFor({
        [LANDING_URL]: LANDING_HTML,
        [AUSTIN]: regionPage(X),
        [DALLAS]: regionPage(Z),
        [HOUSTON]: regionPage(Y),
      });

      await discovery.run();

      expect(sources).toHaveLength(2);
      expect(sources.map(source => [source.initialized, source.cleanedUp])).toEqual([
        [1, 1],
        [1, 1],
      ]);
      expect(sources[1].fetched).toEqual([AUSTIN, DALLAS, HOUSTON]);
    });

    it('should save landing and region snapshots when a directory is given', async () => {
      const snapshotDir = await makeTempDir();
      try {
        const discovery = discoveryFor(
          {
            [LANDING_URL]: LANDING_HTML,
            [AUSTIN]: regionPage(X),
            [DALLAS]: regionPage(Z),
            [HOUSTON]: regionPage(Y),
          },
          [],
          snapshotDir
        );

        await discovery.run();

        const saved = await fs.readdir(snapshotDir);
        expect(saved.sort()).toEqual(['landing.html', 'region_austin.html', 'region_dallas.html', 'region_houston.html']);
        await expect(fs.readFile(path.join(snapshotDir, 'landing.html'), 'utf-8')).resolves.toBe(LANDING_HTML);
      } finally {
        await fs.rm(snapshotDir, { recursive: true, force: true });
      }
    });
  });
});
