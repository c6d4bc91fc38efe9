import type { CandidatesRepository } from "../db/repositories/candidates.repo";
import type { InternshipsRepository } from "../db/repositories/internships.repo";
import { NotFoundError } from "../shared/errors";
import type { CandidateProfile, Internship } from "../shared/types/domain.types";

/**
 * Read-only source of the data a ranking pass needs. Each call returns a
 * snapshot; callers never mutate what they receive.
 */
export interface ProfileStore {
  getProfile(candidateId: number): Promise<CandidateProfile>;
  listActivePostings(): Promise<Internship[]>;
}

export class RepositoryProfileStore implements ProfileStore {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly internshipsRepository: InternshipsRepository,
  ) {}

  async getProfile(candidateId: number): Promise<CandidateProfile> {
    const profile = await this.candidatesRepository.getProfileById(candidateId);
    if (!profile) {
      throw new NotFoundError(`Candidate ${candidateId} not found`, "candidate");
    }
    return profile;
  }

  async listActivePostings(): Promise<Internship[]> {
    return this.internshipsRepository.listActive();
  }
}
