import { promises as fs, readFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { SnapshotSource } from '../src/services/snapshotSource';

export const ORIGIN = 'https://homes.example.com';

export function readFixture(name: string): string {
  return readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'listing-harvester-'));
}

/**
 * In-process snapshot source serving canned markup by URL.
 * URLs listed in `failing` reject like a navigation failure.
 */
export class FakeSnapshotSource implements SnapshotSource {
  readonly fetched: string[] = [];
  initialized = 0;
  cleanedUp = 0;

  constructor(
    private readonly pages: Record<string, string>,
    private readonly failing: string[] = []
  ) {}

  async initialize(): Promise<void> {
    this.initialized++;
  }

  async fetchPage(url: string): Promise<string> {
    this.fetched.push(url);
    if (this.failing.includes(url)) {
      throw new Error(`net::ERR_CONNECTION_RESET at ${url}`);
    }
    const html = this.pages[url];
    if (html === undefined) {
      throw new Error(`Navigation timeout of 30000 ms exceeded for ${url}`);
    }
    return html;
  }

  async cleanup(): Promise<void> {
    this.cleanedUp++;
  }
}
