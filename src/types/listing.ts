/**
 * Nearby point of interest listed on a community page
 */
export interface NearbyPlace {
  name: string;
  category: string | null;
  distance: string | null;
  rating: number | null;
  reviews: number | null;
}

/**
 * Included feature of a home plan, bucketed into one of four sections
 */
export interface Feature {
  description: string;
  sectionIndex: number;
}

export interface FloorplanImage {
  name: string;
  imageUrl: string;
}

export interface HomePlanDetails {
  price: string | null;
  beds: string | null;
  baths: string | null;
  halfBaths: string | null;
  sqft: string | null;
  status: string;
  imageUrl: string | null;
}

/**
 * Floor plan offered in a community
 */
export interface HomePlan {
  name: string | null;
  url: string | null;
  details: HomePlanDetails;
  floorplanImages: FloorplanImage[];
  includedFeatures: Feature[];
}

/**
 * Move-in-ready home (quick move-in) in a community
 */
export interface HomeSite {
  address: string | null;
  name: string | null;
  plan: string | null;
  id: string;
  price: string | null;
  beds: string | null;
  baths: string | null;
  sqft: string | null;
  status: string;
  imageUrl: string | null;
  url: string | null;
  latitude: number | null;
  longitude: number | null;
  overview: string | null;
  images: string[];
}

export interface Collection {
  name: string;
  url: string | null;
}

export interface CommunityLocation {
  latitude: number | null;
  longitude: number | null;
  address: {
    city: string | null;
    state: string | null;
    market: string | null;
  };
}

export interface CommunityDetails {
  priceRange: string | null;
  sqftRange: string | null;
  bedRange: string | null;
  bathRange: string | null;
  storiesRange: string | null;
  communityCount: number;
}

/**
 * Root record harvested from one community detail page
 */
export interface Community {
  timestamp: string;
  name: string | null;
  status: string | null;
  url: string;
  priceFrom: string | null;
  address: string | null;
  phone: string | null;
  description: string | null;
  images: string[];
  location: CommunityLocation;
  details: CommunityDetails;
  amenities: string[];
  homeplans: HomePlan[];
  homesites: HomeSite[];
  nearbyplaces: NearbyPlace[];
  collections: Collection[];
}

/**
 * Fields filled in from a home site's own detail page
 */
export interface HomeSiteEnrichment {
  latitude: number | null;
  longitude: number | null;
  overview: string | null;
  images: string[];
}

/**
 * Fields filled in from a home plan's own detail page
 */
export interface HomePlanEnrichment {
  halfBaths: string | null;
  stories: number | null;
  floorplanImages: FloorplanImage[];
  includedFeatures: Feature[];
}

/**
 * Outcome of harvesting one frontier URL
 */
export type HarvestOutcome = 'harvested' | 'skipped' | 'failed';

export interface HarvestSummary {
  total: number;
  harvested: number;
  skipped: number;
  failed: number;
}

/**
 * Uniform pseudo-random source in [0, 1)
 */
export type RandomSource = () => number;
