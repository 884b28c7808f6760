export type SocialPlatform = 'Instagram' | 'LinkedIn';

export interface SocialLink {
  platform: SocialPlatform;
  url: string;
}

/** Consumer-facing place types that are better found on Instagram than LinkedIn */
export const INSTAGRAM_CATEGORIES: ReadonlySet<string> = new Set([
  'cafe',
  'restaurant',
  'bakery',
  'bar',
  'night_club',
  'clothing_store',
  'beauty_salon',
  'spa',
  'gym',
  'florist',
  'meal_delivery',
  'meal_takeaway',
  'store',
  'shopping_mall',
  'tourist_attraction',
]);

export function socialLinkFor(name: string, categories: readonly string[]): SocialLink {
  if (categories.some((c) => INSTAGRAM_CATEGORIES.has(c))) {
    const tag = name.replace(/ /g, '').toLowerCase();
    return { platform: 'Instagram', url: `https://www.instagram.com/explore/tags/${tag}/` };
  }
  return {
    platform: 'LinkedIn',
    url: `https://www.linkedin.com/search/results/all/?keywords=${name.replace(/ /g, '%20')}`,
  };
}
