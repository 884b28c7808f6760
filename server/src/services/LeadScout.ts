import { ResolutionError } from '../errors/ScoutError';
import { describeInvalidBox } from '../schemas/boundingBox';
import { ScoutReport, ScoutRequest } from '../types/lead';
import { CandidateSearch } from './CandidateSearch';
import { partition, VerificationOrchestrator } from './VerificationOrchestrator';

/**
 * One scouting run: strict-zone search, then verification of every candidate.
 * SearchError propagates; per-candidate failures end up in the errored bucket.
 */
export class LeadScout {
  constructor(
    private readonly search: CandidateSearch,
    private readonly orchestrator: VerificationOrchestrator,
  ) {}

  async scout({ query, criteria, box }: ScoutRequest): Promise<ScoutReport> {
    const problem = describeInvalidBox(box);
    if (problem) {
      throw new ResolutionError(`Unusable bounding box (${problem})`);
    }

    console.info(`[scout] searching "${query}" in N${box.north} S${box.south} E${box.east} W${box.west}`);
    const candidates = await this.search.search(query, box);

    if (candidates.length === 0) {
      console.info('[scout] no candidates in zone');
      return { box, query, criteria, rawCount: 0, leads: [], partition: partition([]) };
    }

    console.info(`[scout] verifying ${candidates.length} candidates`);
    const leads = await this.orchestrator.verifyAll(candidates, criteria);
    const result = partition(leads);

    const { approved, rejected, errored } = result.counts;
    console.info(`[scout] done: ${approved} approved, ${rejected} rejected, ${errored} errored`);

    return { box, query, criteria, rawCount: candidates.length, leads, partition: result };
  }
}
