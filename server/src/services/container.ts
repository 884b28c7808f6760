import { ChatCompletionsAdapter } from '../adapters/ChatCompletionsAdapter';
import { GeminiVisionAdapter } from '../adapters/GeminiVisionAdapter';
import { GoogleGeocodingAdapter } from '../adapters/GoogleGeocodingAdapter';
import { GooglePlacesAdapter } from '../adapters/GooglePlacesAdapter';
import { Env } from '../config/env';
import { CandidateSearch } from './CandidateSearch';
import { LeadScout } from './LeadScout';
import { LeadVerifier } from './LeadVerifier';
import { VerificationOrchestrator } from './VerificationOrchestrator';
import { WebsiteExcerptFetcher } from './WebsiteExcerptFetcher';
import { ZoneCache } from './ZoneCache';
import { ZoneResolver } from './ZoneResolver';

/** Everything the HTTP layer needs, built once per process. */
export interface AppServices {
  cache: ZoneCache;
  zoneResolver: Pick<ZoneResolver, 'resolveFromText' | 'resolveFromImage'>;
  leadScout: Pick<LeadScout, 'scout'>;
}

export function buildServices(config: Env): AppServices {
  const cache = new ZoneCache(config.CACHE_TTL_SECONDS);

  const zoneResolver = new ZoneResolver(
    new GoogleGeocodingAdapter(config.GEOCODE_URL, config.GOOGLE_API_KEY),
    new GeminiVisionAdapter(config.AI_STUDIO_KEY, config.VISION_MODEL),
    { defaultCountry: config.DEFAULT_COUNTRY, cache },
  );

  const verifier = new LeadVerifier(
    new ChatCompletionsAdapter({
      baseUrl: config.CHAT_BASE_URL,
      apiKey: config.GROQ_API_KEY,
      model: config.VERDICT_MODEL,
      timeoutMs: config.MODEL_TIMEOUT_MS,
    }),
    new WebsiteExcerptFetcher(),
  );

  const leadScout = new LeadScout(
    new CandidateSearch(new GooglePlacesAdapter(config.PLACES_URL, config.GOOGLE_API_KEY)),
    new VerificationOrchestrator(verifier, { maxConcurrency: config.VERIFY_MAX_CONCURRENCY }),
  );

  return { cache, zoneResolver, leadScout };
}
