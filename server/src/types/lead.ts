/**
 * Core records flowing through a scouting run.
 *
 * Every record here lives for a single run only; nothing is persisted.
 */

export interface BoundingBox {
  north: number;
  south: number;
  east: number;
  west: number;
}

/** A business returned by the places search, before verification */
export interface Candidate {
  name: string;
  formattedAddress: string;
  summary?: string;
  /** Provider place types, in provider order, e.g. ["bakery", "store"] */
  categories: string[];
  websiteUrl?: string;
  rating?: number;
  phone?: string;
  mapsUrl?: string;
  /** Review texts in provider order; possibly empty */
  reviews: string[];
}

export type VerdictStatus = 'APPROVED' | 'REJECTED' | 'ERROR';

export interface Verdict {
  status: VerdictStatus;
  reason: string;
  pros: string[];
  cons: string[];
}

export interface VerifiedCandidate {
  candidate: Candidate;
  verdict: Verdict;
}

export interface VerdictCounts {
  approved: number;
  rejected: number;
  errored: number;
  total: number;
}

export interface PartitionedLeads {
  approved: VerifiedCandidate[];
  rejected: VerifiedCandidate[];
  errored: VerifiedCandidate[];
  counts: VerdictCounts;
}

export interface ScoutRequest {
  query: string;
  criteria: string;
  box: BoundingBox;
}

export interface ScoutReport {
  box: BoundingBox;
  query: string;
  criteria: string;
  /** Number of candidates the places search returned */
  rawCount: number;
  /** Verified candidates in search order */
  leads: VerifiedCandidate[];
  partition: PartitionedLeads;
}
