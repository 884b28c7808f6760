import { z } from 'zod';
import { ChatModel } from '../adapters/ProviderAdapters';
import { Candidate, Verdict, VerifiedCandidate } from '../types/lead';
import { parseJsonReply } from '../utils/jsonReply';
import { WebsiteExcerptFetcher } from './WebsiteExcerptFetcher';

export const MAX_REVIEWS_IN_EVIDENCE = 3;
export const VERIFIER_SYSTEM_PROMPT = 'Return JSON only.';

const verdictReplySchema = z.object({
  status: z.enum(['APPROVED', 'REJECTED']),
  reason: z.string(),
  pros: z.array(z.string()),
  cons: z.array(z.string()),
});

export function errorVerdict(): Verdict {
  return { status: 'ERROR', reason: 'AI Timeout', pros: [], cons: [] };
}

export interface Evidence {
  name: string;
  categories: string[];
  summary: string;
  reviews: string[];
  websiteExcerpt: string;
}

export function buildEvidence(candidate: Candidate, websiteExcerpt: string): Evidence {
  return {
    name: candidate.name,
    categories: candidate.categories,
    summary: candidate.summary ?? 'No summary provided',
    reviews: candidate.reviews.slice(0, MAX_REVIEWS_IN_EVIDENCE),
    websiteExcerpt,
  };
}

export function buildVerdictPrompt(criteria: string, evidence: Evidence): string {
  const reviews = evidence.reviews.length
    ? evidence.reviews.map((r, i) => `  ${i + 1}. ${r}`).join('\n')
    : '  No reviews available';

  return `Role: Strict Business Auditor.
User Criteria: "${criteria}"

Candidate:
- Name: ${evidence.name}
- Types: ${evidence.categories.length ? evidence.categories.join(', ') : 'none listed'}
- Summary: ${evidence.summary}
- Reviews:
${reviews}
- Website excerpt: ${evidence.websiteExcerpt}

Task: Does this candidate STRICTLY match the user criteria?
Answer APPROVED or REJECTED, nothing in between.
Give a short reason, and list short positive signals (pros) and negative signals (cons) drawn from the reviews.
Return a single JSON object with exactly these fields:
{"status": "APPROVED" | "REJECTED", "reason": "short explanation", "pros": ["..."], "cons": ["..."]}`;
}

/** Validates a model reply; throws when it is not a complete verdict. */
export function parseVerdict(reply: string): Verdict {
  return verdictReplySchema.parse(parseJsonReply(reply));
}

/**
 * Checks one candidate against the user's criteria.
 * Never rejects: any failure along the way yields an ERROR verdict for this candidate only.
 */
export class LeadVerifier {
  constructor(
    private readonly model: ChatModel,
    private readonly websites: WebsiteExcerptFetcher,
  ) {}

  async verify(candidate: Candidate, criteria: string): Promise<VerifiedCandidate> {
    try {
      const excerpt = await this.websites.fetchExcerpt(candidate.websiteUrl);
      const reply = await this.model.complete({
        system: VERIFIER_SYSTEM_PROMPT,
        user: buildVerdictPrompt(criteria, buildEvidence(candidate, excerpt)),
        temperature: 0,
        jsonMode: true,
      });
      return { candidate, verdict: parseVerdict(reply) };
    } catch (err) {
      console.warn(`[verify] "${candidate.name}" failed:`, err instanceof Error ? err.message : err);
      return { candidate, verdict: errorVerdict() };
    }
  }
}
