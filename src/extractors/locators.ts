/**
 * Structural anchors for the community, home-site and home-plan pages.
 *
 * Extraction code only ever refers to these entries, so a markup change on the
 * source site is a change to this table rather than to the assembler.
 */
export const LOCATORS = {
  discovery: {
    regionLink: 'a.city-link',
    communityCard: 'div.community-horizontal',
    detailLink: 'a.button--blue--solid',
  },
  community: {
    overviewHeading: 'div.community-detail-overview article h1',
    location: 'div#community-driving-directions--location',
    locationAddress: 'div.has-dividers p',
    phoneLink: 'a[href^="tel:"]',
    description: 'meta[name="description"]',
    heroSlide: 'li.slick-slide.orbit-slide',
    heroImage: 'span[data-lazy]',
    detailColumns: 'div.small-6.medium-6.large-3.column',
    nearbyGroup: 'div.multicol',
    nearbyHeading: 'h5',
    nearbyName: 'span.plain',
  },
  labels: {
    bedrooms: 'Bedrooms',
    fullBathrooms: 'Full Bathrooms',
    halfBathrooms: 'Half Bathrooms',
    stories: 'Stories',
  },
  homeSiteRow: {
    section: 'section[aria-label="Quick Move Ins"]',
    row: 'div.qmi-vertical',
    content: 'div.content',
    body: 'div.mid',
    image: 'div.image img',
    status: '[class*="status"]',
  },
  homePlanRow: {
    row: 'div.row.columns.collapse.floorplan-vertical',
    content: 'div.content',
    image: 'div.image',
    lazyScript: 'script[type="text/lazyload"]',
  },
  row: {
    title: 'h3',
    titleLink: 'h3 a',
    price: 'div.top-details',
    specs: 'div.bottom-details',
  },
  homeSitePage: {
    article: 'article.small-12.medium-10.large-8.column.text-center.pad-bottom-2',
    mapLink: 'a.plain[href*="maps.google.com"]',
    slide: 'li.slick-slide.orbit-slide',
    lazyImage: 'span.hidden-image[data-lazy]',
    slideImage: 'img.orbit-image',
  },
  homePlanPage: {
    featureSection: 'div.small-12.large-6.column.text.align-middle.text-left',
    detailColumns: 'div.small-6.medium-6.large-4.column',
    tabsContent: 'div.tabs-content',
    tabPanel: 'div.tabs-panel',
  },
  overviewSkip: {
    prefixes: ['Plan #'],
    contains: ['Estimated Completion', 'Home Address'],
  },
  placeholderImageSuffixes: ['meritageLoadingCommunityHero.gif', 'loading.gif', 'spinner.gif'],
} as const;

export type Locators = typeof LOCATORS;
