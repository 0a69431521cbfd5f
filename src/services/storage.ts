import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Community } from '../types/listing';
import { lastPathSegment } from '../extractors/fieldExtractors';

const frontierSchema = z.array(z.string().url());

/**
 * Filesystem-safe key for a detail-page URL, taken from its last path segment
 */
export function outputKey(url: string): string {
  const segment = lastPathSegment(url).replace(/[^A-Za-z0-9._-]/g, '_');
  return segment || 'index';
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * On-disk storage for page snapshots and harvested community records.
 *
 * Layout under the output directory:
 *   html/  raw page snapshots (enrichment snapshots are transient)
 *   json/  one record per community URL
 */
export class StorageService {
  readonly snapshotDir: string;
  readonly recordDir: string;

  constructor(outputDir: string) {
    this.snapshotDir = path.join(outputDir, 'html');
    this.recordDir = path.join(outputDir, 'json');
  }

  async ensureDirectories(): Promise<void> {
    await fs.mkdir(this.snapshotDir, { recursive: true });
    await fs.mkdir(this.recordDir, { recursive: true });
  }

  recordPath(key: string): string {
    return path.join(this.recordDir, `${key}.json`);
  }

  snapshotPath(name: string): string {
    return path.join(this.snapshotDir, `${name}.html`);
  }

  async hasRecord(key: string): Promise<boolean> {
    return pathExists(this.recordPath(key));
  }

  async writeRecord(key: string, record: Community): Promise<string> {
    const target = this.recordPath(key);
    await fs.mkdir(this.recordDir, { recursive: true });
    await fs.writeFile(target, JSON.stringify(record, null, 2), 'utf-8');
    console.log(`Record saved to: ${target}`);
    return target;
  }

  async saveSnapshot(name: string, html: string): Promise<string> {
    const target = this.snapshotPath(name);
    await fs.mkdir(this.snapshotDir, { recursive: true });
    await fs.writeFile(target, html, 'utf-8');
    return target;
  }

  /**
   * Delete a snapshot if present. Returns false (after logging) when removal fails.
   */
  async removeSnapshot(name: string): Promise<boolean> {
    const target = this.snapshotPath(name);
    try {
      await fs.rm(target, { force: true });
      return true;
    } catch (error) {
      console.warn(`Could not delete snapshot ${target}:`, error instanceof Error ? error.message : error);
      return false;
    }
  }
}

/**
 * First candidate path that exists, in the given order
 */
export async function resolveFrontierPath(candidates: readonly string[]): Promise<string | null> {
  for (const candidate of candidates) {
    if (await pathExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Read and validate a frontier file (a JSON array of absolute URLs)
 */
export async function readFrontier(filePath: string): Promise<string[]> {
  const raw = await fs.readFile(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Frontier file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : error}`);
  }

  const result = frontierSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Frontier file ${filePath} must be an array of absolute URLs`);
  }
  return result.data;
}

export async function writeFrontier(filePath: string, urls: string[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(urls, null, 2), 'utf-8');
  console.log(`Frontier of ${urls.length} links saved to ${filePath}`);
}
