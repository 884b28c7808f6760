import pLimit from 'p-limit';
import { Candidate, PartitionedLeads, VerifiedCandidate } from '../types/lead';
import { errorVerdict, LeadVerifier } from './LeadVerifier';

export interface OrchestratorOptions {
  /** Upper bound on simultaneous verifications; 0 launches every task at once */
  maxConcurrency?: number;
}

export class VerificationOrchestrator {
  private readonly maxConcurrency: number;

  constructor(
    private readonly verifier: Pick<LeadVerifier, 'verify'>,
    options: OrchestratorOptions = {},
  ) {
    this.maxConcurrency = options.maxConcurrency ?? 0;
  }

  /**
   * Verifies every candidate and waits for all of them.
   * Output order matches input order; a failing task contributes an ERROR verdict
   * and never rejects the batch.
   */
  async verifyAll(candidates: readonly Candidate[], criteria: string): Promise<VerifiedCandidate[]> {
    const run = (candidate: Candidate): Promise<VerifiedCandidate> =>
      Promise.resolve()
        .then(() => this.verifier.verify(candidate, criteria))
        .catch((err: unknown): VerifiedCandidate => {
          console.error(`[verify] unexpected failure for "${candidate.name}":`, err);
          return { candidate, verdict: errorVerdict() };
        });

    if (this.maxConcurrency > 0) {
      const limit = pLimit(this.maxConcurrency);
      return Promise.all(candidates.map((c) => limit(() => run(c))));
    }
    return Promise.all(candidates.map(run));
  }
}

export function partition(results: readonly VerifiedCandidate[]): PartitionedLeads {
  const approved = results.filter((r) => r.verdict.status === 'APPROVED');
  const rejected = results.filter((r) => r.verdict.status === 'REJECTED');
  const errored = results.filter((r) => r.verdict.status === 'ERROR');

  return {
    approved,
    rejected,
    errored,
    counts: {
      approved: approved.length,
      rejected: rejected.length,
      errored: errored.length,
      total: results.length,
    },
  };
}
