import type { Cheerio } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { Feature } from '../types/listing';
import { LOCATORS } from './locators';

export interface BedsBaths {
  beds: string | null;
  baths: string | null;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface RowSpecs {
  beds: string | null;
  baths: string | null;
  sqft: string | null;
}

/**
 * Collapse runs of whitespace (including newlines) into single spaces
 */
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Trimmed text of the first matched node, or null when nothing matched or the text is blank
 */
export function textOf<T extends AnyNode>(selection: Cheerio<T>): string | null {
  if (selection.length === 0) return null;
  const text = selection.first().text().trim();
  return text || null;
}

export function extractPrice(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = text.match(/\$[\d,]+/);
  return match ? match[0] : null;
}

/**
 * Bed and bath counts written as a number followed by the unit word ("3 Bedrooms", "2.5 ba")
 */
export function extractBedsBaths(text: string | null | undefined): BedsBaths {
  if (!text) return { beds: null, baths: null };
  const bedsMatch = text.match(/(\d+)\s*(?:Bedroom|Bed|BR)/i);
  const bathsMatch = text.match(/(\d+(?:\.\d+)?)\s*(?:Bathroom|Bath|BA)/i);
  return {
    beds: bedsMatch ? bedsMatch[1] : null,
    baths: bathsMatch ? bathsMatch[1] : null,
  };
}

/**
 * Square footage preceding "sq ft" (dots allowed), commas removed
 */
export function extractSqft(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = text.match(/(\d[\d,]*)\s*sq\.?\s*ft/i);
  return match ? match[1].replace(/,/g, '') : null;
}

export function extractStartingPrice(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = text.match(/Starting at\s+(\$[\d,]+)/);
  return match ? `From ${match[1]}` : null;
}

export function extractSqftRange(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = text.match(/Approx\.\s+Sq\.\s+Ft\.\s+([\d,]+)\s*-\s*([\d,]+)/);
  return match ? `${match[1]} - ${match[2]}` : null;
}

export function parseCoordinate(value: string | null | undefined): number | null {
  if (value === null || value === undefined || value.trim() === '') return null;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Destination coordinates from a map link query ("...&daddr=33.45,-112.07")
 */
export function extractCoordinates(href: string | null | undefined): Coordinates | null {
  if (!href) return null;
  const match = href.match(/daddr=([-\d.]+),([-\d.]+)/);
  if (!match) return null;

  const latitude = parseCoordinate(match[1]);
  const longitude = parseCoordinate(match[2]);
  if (latitude === null || longitude === null) return null;
  return { latitude, longitude };
}

/**
 * Resolve an href against the site origin; absolute URLs are returned untouched.
 * Null when the href cannot be resolved (e.g. a bare "//").
 */
export function normalizeUrl(href: string, origin: string): string | null {
  if (href.startsWith('http')) return href;
  try {
    return new URL(href, origin).href;
  } catch (error) {
    console.warn(`Skipping unresolvable href "${href}":`, error instanceof Error ? error.message : error);
    return null;
  }
}

export function isPlaceholderImage(url: string): boolean {
  return LOCATORS.placeholderImageSuffixes.some(suffix => url.endsWith(suffix));
}

/**
 * Image URL of an element, preferring the lazily-loaded source over the eager one
 */
export function extractImageSource(element: Cheerio<Element>, origin: string): string | null {
  if (element.length === 0) return null;

  const raw = element.attr('data-lazy') || element.attr('src') || element.attr('data-csrc');
  const src = raw?.trim();
  if (!src) return null;

  const url = normalizeUrl(src, origin);
  return url && !isPlaceholderImage(url) ? url : null;
}

/**
 * The src of the <img> markup held inside a deferred-load script body
 */
export function extractLazyScriptImage(scriptBody: string | null | undefined, origin: string): string | null {
  if (!scriptBody) return null;
  const match = scriptBody.match(/<img[^>]*src="([^"]*)"/);
  if (!match || !match[1]) return null;

  const url = normalizeUrl(match[1], origin);
  return url && !isPlaceholderImage(url) ? url : null;
}

/**
 * Find the column whose heading text is exactly `label` and return the value span next to it.
 * Only the first column carrying the label is considered.
 */
export function extractLabeledValue(columns: Cheerio<Element>, label: string): string | null {
  for (let i = 0; i < columns.length; i++) {
    const heading = columns.eq(i).find('h3').first();
    if (heading.length === 0 || heading.text().trim() !== label) continue;

    return textOf(heading.nextAll('span').first());
  }
  return null;
}

/**
 * Bed, bath and area labels from a listing row ("Bed 3 | Bath 2 | Approx. 1,850 sq. ft.").
 * Falls back to the unit-word patterns when the row uses another wording.
 */
export function parseRowSpecs(text: string | null | undefined): RowSpecs {
  if (!text) return { beds: null, baths: null, sqft: null };

  const fallback = extractBedsBaths(text);
  const beds = text.match(/Bed\s+(\d+)/)?.[1] ?? fallback.beds;
  const baths = text.match(/Bath\s+(\d+)/)?.[1] ?? fallback.baths;
  const sqft = text.match(/Approx\.\s+([\d,]+)\s+sq\.\s+ft\./)?.[1] ?? extractSqft(text);

  return {
    beds: beds ? `${beds}bd` : null,
    baths: baths ? `${baths}ba` : null,
    sqft: sqft ? `${sqft} ft²` : null,
  };
}

export function stripPostalCode(address: string): string {
  return address.replace(/\s+\d{5}$/, '');
}

/**
 * Story count from a labeled value; anything but a plain integer is unknown
 */
export function parseStoryCount(value: string | null | undefined): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

export function floorLabel(floor: number): string {
  switch (floor) {
    case 1:
      return '1st Floor Floorplan';
    case 2:
      return '2nd Floor Floorplan';
    case 3:
      return '3rd Floor Floorplan';
    default:
      return `${floor}th Floor Floorplan`;
  }
}

/**
 * Spread features over four sections in page order.
 *
 * Each section holds floor(total / 4) features and the last one takes the remainder.
 * `totalCount` is the number of list items on the page, blank ones included, so it can
 * exceed `descriptions.length`. With fewer than four items every feature advances the
 * section index (capped at 3).
 */
export function assignFeatureSections(descriptions: string[], totalCount: number = descriptions.length): Feature[] {
  const perSection = totalCount > 0 ? Math.floor(totalCount / 4) : 0;
  const features: Feature[] = [];
  let section = 0;

  for (const description of descriptions) {
    features.push({ description, sectionIndex: section });
    if (features.length >= (section + 1) * perSection) {
      section = Math.min(section + 1, 3);
    }
  }

  return features;
}

/**
 * Last non-empty path segment of a URL ("/state/tx/austin/plan/" -> "plan")
 */
export function lastPathSegment(url: string): string {
  const withoutQuery = url.split(/[?#]/)[0];
  const segments = withoutQuery.split('/').filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : '';
}

function titleCase(slug: string): string {
  return slug
    .split('-')
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * State and city encoded in a community URL ("/state/az/phoenix/...")
 */
export function locationFromUrl(url: string): { state: string | null; city: string | null } {
  const match = url.match(/\/state\/([a-z]{2})\/([^/?#]+)\//i);
  if (!match) return { state: null, city: null };
  return { state: match[1].toUpperCase(), city: titleCase(match[2]) };
}
