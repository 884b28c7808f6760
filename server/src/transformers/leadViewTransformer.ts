import { PartitionedLeads, VerdictStatus, VerifiedCandidate } from '../types/lead';
import { SocialLink, socialLinkFor } from './socialLink';

/**
 * Display-ready lead for the presentation layer.
 * Raw review texts are not included; the verdict's pros/cons summarize them.
 */
export interface LeadView {
  name: string;
  address: string;
  phone: string;
  rating: number | null;
  websiteUrl: string | null;
  mapsUrl: string | null;
  social: SocialLink;
  status: VerdictStatus;
  reason: string;
  pros: string[];
  cons: string[];
}

export interface PartitionedLeadViews {
  approved: LeadView[];
  rejected: LeadView[];
  errored: LeadView[];
}

export function toLeadView({ candidate, verdict }: VerifiedCandidate): LeadView {
  return {
    name: candidate.name,
    address: candidate.formattedAddress,
    phone: candidate.phone ?? 'Not listed',
    rating: candidate.rating ?? null,
    websiteUrl: candidate.websiteUrl ?? null,
    mapsUrl: candidate.mapsUrl ?? null,
    social: socialLinkFor(candidate.name, candidate.categories),
    status: verdict.status,
    reason: verdict.reason,
    pros: verdict.pros,
    cons: verdict.cons,
  };
}

export function toLeadViews(leads: VerifiedCandidate[]): LeadView[] {
  return leads.map(toLeadView);
}

export function toPartitionedLeadViews(partition: PartitionedLeads): PartitionedLeadViews {
  return {
    approved: toLeadViews(partition.approved),
    rejected: toLeadViews(partition.rejected),
    errored: toLeadViews(partition.errored),
  };
}
