import { load } from 'cheerio';
import { FloorplanImage, HomePlanEnrichment, HomeSiteEnrichment } from '../types/listing';
import {
  assignFeatureSections,
  extractCoordinates,
  extractImageSource,
  extractLabeledValue,
  floorLabel,
  parseStoryCount,
} from './fieldExtractors';
import { LOCATORS } from './locators';

function isOverviewParagraph(text: string): boolean {
  const { prefixes, contains } = LOCATORS.overviewSkip;
  if (prefixes.some(prefix => text.startsWith(prefix))) return false;
  return !contains.some(marker => text.includes(marker));
}

/**
 * Coordinates, overview and gallery from a move-in-ready home's detail page
 */
export function extractHomeSiteDetails(html: string, origin: string): HomeSiteEnrichment {
  const $ = load(html);
  const locators = LOCATORS.homeSitePage;
  const result: HomeSiteEnrichment = { latitude: null, longitude: null, overview: null, images: [] };

  const article = $(locators.article).first();
  if (article.length > 0) {
    const coordinates = extractCoordinates(article.find(locators.mapLink).first().attr('href'));
    if (coordinates) {
      result.latitude = coordinates.latitude;
      result.longitude = coordinates.longitude;
    }

    const paragraphs = article.find('p').toArray();
    for (const paragraph of paragraphs) {
      const text = $(paragraph).text().trim();
      if (isOverviewParagraph(text)) {
        result.overview = text;
        break;
      }
    }
  }

  for (const slide of $(locators.slide).toArray()) {
    const image = extractImageSource($(slide).find(locators.lazyImage).first(), origin)
      ?? extractImageSource($(slide).find(locators.slideImage).first(), origin);
    if (image) {
      result.images.push(image);
    }
  }

  return result;
}

/**
 * Included features, half baths, story count and per-floor images from a home plan's detail page
 */
export function extractHomePlanDetails(html: string, origin: string): HomePlanEnrichment {
  const $ = load(html);
  const locators = LOCATORS.homePlanPage;

  const lists = $(locators.featureSection)
    .toArray()
    .map(section => $(section).find('ul').first())
    .filter(list => list.length > 0);
  const items = lists.flatMap(list => list.find('li').toArray());
  const descriptions = items.map(item => $(item).text().trim()).filter(Boolean);
  const includedFeatures = assignFeatureSections(descriptions, items.length);

  const columns = $(locators.detailColumns);
  const halfBaths = extractLabeledValue(columns, LOCATORS.labels.halfBathrooms);
  const stories = parseStoryCount(extractLabeledValue(columns, LOCATORS.labels.stories));

  const floorplanImages: FloorplanImage[] = [];
  if (stories !== null) {
    const panels = $(locators.tabsContent).first().find(locators.tabPanel);
    const fallback = panels.first();

    for (let floor = 1; floor <= stories; floor++) {
      const panel = floor - 1 < panels.length ? panels.eq(floor - 1) : fallback;
      const imageUrl = extractImageSource(panel.find('img').first(), origin);
      if (imageUrl) {
        floorplanImages.push({ name: floorLabel(floor), imageUrl });
      }
    }
  }

  return { halfBaths, stories, floorplanImages, includedFeatures };
}
