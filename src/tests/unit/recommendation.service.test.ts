import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { ProfileStore } from "../../recommendations/profile-store";
import {
  RECOMMENDATIONS_MESSAGE,
  RecommendationService,
  rankInternships,
} from "../../recommendations/recommendation.service";
import { InvalidRecordError, MalformedInputError, NotFoundError } from "../../shared/errors";
import type { CandidateProfile, Internship } from "../../shared/types/domain.types";
import { buildInternship, buildProfile, noopLogger } from "../fixtures";

class InMemoryProfileStore implements ProfileStore {
  constructor(
    private readonly profiles: CandidateProfile[],
    private readonly internships: Internship[],
  ) {}

  async getProfile(candidateId: number): Promise<CandidateProfile> {
    const profile = this.profiles.find((item) => item.id === candidateId);
    if (!profile) {
      throw new NotFoundError(`Candidate ${candidateId} not found`, "candidate");
    }
    return profile;
  }

  async listActivePostings(): Promise<Internship[]> {
    return this.internships;
  }
}

const profile = buildProfile();
const strong = buildInternship({ id: 1 });
const tiedA = buildInternship({ id: 2, location: "Tokyo", requiredSkills: "Go", minEducation: undefined });
const tiedB = buildInternship({ id: 3, location: "Paris", requiredSkills: "Haskell", minEducation: undefined });
const weak = buildInternship({
  id: 4,
  location: "Oslo",
  requiredSkills: "Haskell",
  minEducation: "PhD",
  experienceRequired: 8,
});

describe("rankInternships", () => {
  it("sorts by score descending and keeps input order on ties", () => {
    const ranked = rankInternships(profile, [weak, tiedA, strong, tiedB], 10);

    assert.deepEqual(
      ranked.recommendations.map((item) => item.internship.id),
      [1, 2, 3, 4],
    );
    assert.equal(ranked.recommendations[1].score, ranked.recommendations[2].score);
  });

  it("truncates to the limit", () => {
    const ranked = rankInternships(profile, [weak, tiedA, strong, tiedB], 2);

    assert.deepEqual(ranked.recommendations.map((item) => item.internship.id), [1, 2]);
    assert.equal(ranked.total, 2);
  });

  it("returns nothing for a zero limit", () => {
    const ranked = rankInternships(profile, [strong, weak], 0);

    assert.deepEqual(ranked.recommendations, []);
    assert.equal(ranked.total, 0);
  });

  it("returns every posting when the limit exceeds the eligible count", () => {
    const ranked = rankInternships(profile, [weak, strong], 50);

    assert.deepEqual(ranked.recommendations.map((item) => item.internship.id), [1, 4]);
    assert.equal(ranked.total, 2);
  });

  it("returns an empty ranking for no postings", () => {
    assert.deepEqual(rankInternships(profile, [], 5), { recommendations: [], total: 0 });
  });

  it("pairs every score with a non-empty explanation", () => {
    const ranked = rankInternships(profile, [strong, weak], 5);

    assert.equal(ranked.recommendations[0].score, 0.825);
    for (const item of ranked.recommendations) {
      assert.ok(item.explanation.startsWith("Score: "));
    }
  });

  it("reports negative stored experience values as invalid records", () => {
    assert.throws(
      () => rankInternships(buildProfile({ experienceYears: -1 }), [strong], 5),
      (error: unknown) => error instanceof InvalidRecordError && error.field === "experience_years",
    );
    assert.throws(
      () => rankInternships(profile, [buildInternship({ experienceRequired: -2 })], 5),
      (error: unknown) => error instanceof InvalidRecordError && error.field === "experience_required",
    );
  });

  it("rejects a negative or fractional limit", () => {
    assert.throws(() => rankInternships(profile, [strong], -1), MalformedInputError);
    assert.throws(() => rankInternships(profile, [strong], 1.5), MalformedInputError);
  });
});

describe("RecommendationService", () => {
  const store = new InMemoryProfileStore([profile], [weak, strong]);
  const service = new RecommendationService(store, noopLogger);

  it("builds the response envelope with snake_case internships", async () => {
    const response = await service.getRecommendations(1, 1);

    assert.equal(response.success, true);
    assert.equal(response.total, 1);
    assert.equal(response.message, RECOMMENDATIONS_MESSAGE);
    assert.deepEqual(response.recommendations[0].internship, {
      id: 1,
      title: "Backend Intern",
      company: "Acme Labs",
      location: "San Francisco, CA",
      description: null,
      required_skills: "Python, SQL",
      preferred_skills: null,
      duration: null,
      stipend: null,
      application_deadline: null,
      posted_date: null,
      is_active: true,
      min_education: "Bachelors",
      experience_required: 1,
    });
    assert.equal(response.recommendations[0].score, 0.825);
  });

  it("defaults to five recommendations", async () => {
    const many = Array.from({ length: 7 }, (_, index) => buildInternship({ id: 10 + index }));
    const defaultService = new RecommendationService(new InMemoryProfileStore([profile], many), noopLogger);

    const response = await defaultService.getRecommendations(1);
    assert.deepEqual(response.recommendations.map((item) => item.internship.id), [10, 11, 12, 13, 14]);
  });

  it("propagates NotFound for an unknown candidate", async () => {
    await assert.rejects(service.getRecommendations(99, 5), NotFoundError);
  });
});
