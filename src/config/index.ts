import { existsSync } from 'fs';
import path from 'path';
import { config } from 'dotenv';
import { z } from 'zod';

config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const milliseconds = z.coerce.number().int().nonnegative();

const envSchema = z.object({
  SITE_ORIGIN: z.string().url().default('https://www.meritagehomes.com'),
  LANDING_PATH: z.string().startsWith('/').default('/homes'),
  OUTPUT_DIR: z.string().min(1).default('data/listings'),
  DISCOVERY_DIR: z.string().min(1).default('data'),
  FRONTIER_FILE: z.string().min(1).default('community_links.json'),
  HEADLESS: booleanFlag.default('true'),
  NAVIGATION_TIMEOUT_MS: milliseconds.default(30000),
  PAGE_SETTLE_MS: milliseconds.default(5000),
  DETAIL_SETTLE_MS: milliseconds.default(3000),
  REQUEST_INTERVAL_MS: milliseconds.default(2000),
  NODE_ENV: z.string().default('development'),
});

export type HarvesterEnv = z.infer<typeof envSchema>;

/**
 * Parse harvester settings from an environment map, failing on the first invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv): HarvesterEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue.path.join('.');
    throw new Error(`Invalid environment variable ${variable}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Nearest directory at or above `start` holding a package.json.
 * Resolves to the same project root from `src/config` and from `dist/src/config`.
 */
export function findProjectRoot(start: string = __dirname): string {
  let dir = path.resolve(start);
  for (;;) {
    if (existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(start);
    dir = parent;
  }
}

/**
 * Ordered frontier file locations; the batch job uses the first one that exists
 */
export function frontierCandidates(fileName: string, discoveryDir: string, projectRoot: string = findProjectRoot()): string[] {
  return [
    fileName,
    path.join(discoveryDir, fileName),
    path.join('..', fileName),
    path.join(projectRoot, fileName),
  ];
}

const env = parseEnv(process.env);

export const CONFIG = {
  site: {
    origin: env.SITE_ORIGIN,
    landingUrl: `${env.SITE_ORIGIN}${env.LANDING_PATH}`,
  },
  browser: {
    headless: env.HEADLESS,
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    viewport: { width: 1920, height: 1080 },
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  },
  timing: {
    pageSettleMs: env.PAGE_SETTLE_MS,
    detailSettleMs: env.DETAIL_SETTLE_MS,
    requestIntervalMs: env.REQUEST_INTERVAL_MS,
  },
  paths: {
    outputDir: env.OUTPUT_DIR,
    discoveryDir: env.DISCOVERY_DIR,
    frontierFile: env.FRONTIER_FILE,
    frontierCandidates: frontierCandidates(env.FRONTIER_FILE, env.DISCOVERY_DIR),
  },
  sampleUrls: [
    'https://www.meritagehomes.com/state/al/huntsville/madison-preserve-the-estate-series',
    'https://www.meritagehomes.com/state/az/phoenix/heritage-at-maricopa',
    'https://www.meritagehomes.com/state/ca/sacramento/madison-at-ten-trails',
  ],
  nodeEnv: env.NODE_ENV,
} as const;

export type HarvesterConfig = typeof CONFIG;
