import { load } from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import {
  Community,
  HomePlan,
  HomeSite,
  NearbyPlace,
  RandomSource,
} from '../types/listing';
import {
  collapseWhitespace,
  extractImageSource,
  extractLabeledValue,
  extractLazyScriptImage,
  extractSqftRange,
  extractStartingPrice,
  locationFromUrl,
  normalizeUrl,
  parseCoordinate,
  parseRowSpecs,
  stripPostalCode,
  textOf,
} from '../extractors/fieldExtractors';
import { LOCATORS } from '../extractors/locators';
import { ChildEnricher } from './enrichment';

export interface AssemblerOptions {
  origin: string;
  enricher: ChildEnricher;
  random?: RandomSource;
  now?: () => Date;
}

/**
 * Empty community record with every field at its default
 */
export function createCommunity(url: string, timestamp: string): Community {
  return {
    timestamp,
    name: null,
    status: null,
    url,
    priceFrom: null,
    address: null,
    phone: null,
    description: null,
    images: [],
    location: {
      latitude: null,
      longitude: null,
      address: { city: null, state: null, market: null },
    },
    details: {
      priceRange: null,
      sqftRange: null,
      bedRange: null,
      bathRange: null,
      storiesRange: null,
      communityCount: 1,
    },
    amenities: [],
    homeplans: [],
    homesites: [],
    nearbyplaces: [],
    collections: [],
  };
}

/**
 * Pick one image at random from every plan and home-site image
 */
export function pickFallbackImage(community: Community, random: RandomSource): string | null {
  const available: string[] = [];

  for (const plan of community.homeplans) {
    if (plan.details.imageUrl) available.push(plan.details.imageUrl);
  }
  for (const site of community.homesites) {
    if (site.imageUrl) available.push(site.imageUrl);
    available.push(...site.images);
  }

  if (available.length === 0) return null;
  const index = Math.min(Math.floor(random() * available.length), available.length - 1);
  return available[index];
}

/**
 * Name, prices, address, description, hero image and coordinates
 */
export function extractOverview($: CheerioAPI, community: Community, origin: string): void {
  const locators = LOCATORS.community;

  community.name = textOf($(locators.overviewHeading));

  const pageText = $.root().text();
  community.priceFrom = extractStartingPrice(pageText);
  community.details.priceRange = community.priceFrom;

  const location = $(locators.location).first();
  if (location.length > 0) {
    community.address = textOf(location.find(locators.locationAddress));
    community.location.latitude = parseCoordinate(location.attr('data-lat'));
    community.location.longitude = parseCoordinate(location.attr('data-long'));

    const phone = textOf(location.find(locators.phoneLink));
    community.phone = phone ? collapseWhitespace(phone) : null;
  }

  const description = $(locators.description).attr('content')?.trim();
  community.description = description || null;

  const heroImage = extractImageSource($(locators.heroSlide).first().find(locators.heroImage).first(), origin);
  if (heroImage) {
    community.images.push(heroImage);
  }

  const { state, city } = locationFromUrl(community.url);
  community.location.address.state = state;
  community.location.address.city = city;
}

/**
 * Sqft, bedroom, bathroom and story ranges from the labeled detail columns
 */
export function extractDetailRanges($: CheerioAPI, community: Community): void {
  community.details.sqftRange = extractSqftRange($.root().text());

  const columns = $(LOCATORS.community.detailColumns);
  community.details.bedRange = extractLabeledValue(columns, LOCATORS.labels.bedrooms);
  community.details.bathRange = extractLabeledValue(columns, LOCATORS.labels.fullBathrooms);
  community.details.storiesRange = extractLabeledValue(columns, LOCATORS.labels.stories);
}

/**
 * Nearby places, each tagged with the heading of its group
 */
export function extractNearbyPlaces($: CheerioAPI): NearbyPlace[] {
  const locators = LOCATORS.community;
  const places: NearbyPlace[] = [];

  for (const group of $(locators.nearbyGroup).toArray()) {
    const category = textOf($(group).find(locators.nearbyHeading));
    for (const entry of $(group).find(locators.nearbyName).toArray()) {
      places.push({
        name: $(entry).text().trim(),
        category,
        distance: null,
        rating: null,
        reviews: null,
      });
    }
  }

  return places;
}

function linkedUrl(scope: Cheerio<Element>, origin: string): string | null {
  const href = scope.find(LOCATORS.row.titleLink).first().attr('href');
  return href ? normalizeUrl(href, origin) : null;
}

/**
 * Home-site rows of the quick move-in section, before enrichment.
 * Ids follow row order (1-based) and count rows that had no details block.
 */
export function parseHomeSiteRows($: CheerioAPI, origin: string): HomeSite[] {
  const locators = LOCATORS.homeSiteRow;
  const section = $(locators.section).first();
  if (section.length === 0) return [];

  const sites: HomeSite[] = [];
  section.find(locators.row).toArray().forEach((row, index) => {
    const body = $(row).find(locators.content).first().find(locators.body).first();
    if (body.length === 0) return;

    const rawAddress = textOf(body.find('p'));
    const address = rawAddress ? collapseWhitespace(rawAddress) : null;
    const specs = parseRowSpecs(textOf(body.find(LOCATORS.row.specs)));
    const status = textOf($(row).find(locators.status));

    sites.push({
      address,
      name: address ? stripPostalCode(address) : null,
      plan: textOf(body.find(LOCATORS.row.title)),
      id: String(index + 1),
      price: textOf(body.find(LOCATORS.row.price)),
      beds: specs.beds,
      baths: specs.baths,
      sqft: specs.sqft,
      status: status ?? 'Available',
      imageUrl: extractImageSource($(row).find(locators.image).first(), origin),
      url: linkedUrl(body, origin),
      latitude: null,
      longitude: null,
      overview: null,
      images: [],
    });
  });

  return sites;
}

/**
 * Home-plan rows of the floor plan section, before enrichment
 */
export function parseHomePlanRows($: CheerioAPI, origin: string): HomePlan[] {
  const locators = LOCATORS.homePlanRow;

  return $(locators.row).toArray().map(row => {
    const content = $(row).find(locators.content).first();
    const specs = parseRowSpecs(textOf($(row).find(LOCATORS.row.specs)));

    let imageUrl: string | null = null;
    const imageContainer = $(row).find(locators.image).first();
    if (imageContainer.length > 0) {
      const lazyScript = imageContainer.find(locators.lazyScript).first();
      imageUrl = lazyScript.length > 0
        ? extractLazyScriptImage(lazyScript.html(), origin)
        : extractImageSource(imageContainer.find('img').first(), origin);
    }

    return {
      name: textOf(content.find(LOCATORS.row.title)),
      url: linkedUrl(content, origin),
      details: {
        price: textOf($(row).find(LOCATORS.row.price)),
        beds: specs.beds,
        baths: specs.baths,
        halfBaths: null,
        sqft: specs.sqft,
        status: 'Actively selling',
        imageUrl,
      },
      floorplanImages: [],
      includedFeatures: [],
    };
  });
}

/**
 * Build the community record for one rendered detail page, enriching each
 * home site and home plan from its own page.
 */
export async function assembleCommunity(html: string, url: string, options: AssemblerOptions): Promise<Community> {
  const { origin, enricher } = options;
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());

  const $ = load(html);
  const community = createCommunity(url, now().toISOString());

  extractOverview($, community, origin);
  if (community.name) {
    console.log(`Found community name: ${community.name}`);
  }

  extractDetailRanges($, community);

  community.nearbyplaces = extractNearbyPlaces($);
  console.log(`Found ${community.nearbyplaces.length} nearby places`);

  for (const site of parseHomeSiteRows($, origin)) {
    if (site.url) {
      const enrichment = await enricher.enrichHomeSite(site.url);
      if (enrichment) {
        Object.assign(site, enrichment);
      }
    }
    community.homesites.push(site);
    console.log(`Added home site: ${site.name}`);
  }

  for (const plan of parseHomePlanRows($, origin)) {
    if (plan.url) {
      const enrichment = await enricher.enrichHomePlan(plan.url);
      if (enrichment) {
        plan.details.halfBaths = enrichment.halfBaths;
        plan.floorplanImages = enrichment.floorplanImages;
        plan.includedFeatures = enrichment.includedFeatures;
      }
    }
    community.homeplans.push(plan);
    console.log(`Added plan: ${plan.name}`);
  }

  if (community.images.length === 0) {
    const fallback = pickFallbackImage(community, random);
    if (fallback) {
      community.images = [fallback];
      console.log('Added fallback image to community images from plans and home sites');
    }
  }

  return community;
}
