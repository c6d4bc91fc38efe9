import { type Logger, logContext } from "../config/logger";
import { InvalidRecordError, MalformedInputError } from "../shared/errors";
import type { CandidateProfile, Internship } from "../shared/types/domain.types";
import type {
  InternshipPayload,
  RankedRecommendations,
  RecommendationResponse,
  ScoredInternship,
} from "../shared/types/recommendation.types";
import type { ProfileStore } from "./profile-store";
import { explainMatch } from "./scoring/match-explanation";
import { scoreInternship } from "./scoring/match-score";

export const DEFAULT_RECOMMENDATION_LIMIT = 5;
export const RECOMMENDATIONS_MESSAGE = "Recommendations generated successfully";

export class RecommendationService {
  constructor(
    private readonly store: ProfileStore,
    private readonly logger: Logger,
  ) {}

  async getRecommendations(
    candidateId: number,
    limit = DEFAULT_RECOMMENDATION_LIMIT,
  ): Promise<RecommendationResponse> {
    assertValidLimit(limit);
    const startedAt = Date.now();

    const [profile, internships] = await Promise.all([
      this.store.getProfile(candidateId),
      this.store.listActivePostings(),
    ]);

    const ranked = rankInternships(profile, internships, limit);

    logContext(
      this.logger,
      "info",
      "recommendations.ranked",
      { route: "recommendations", user_id: candidateId, latency_ms: Date.now() - startedAt },
      { limit, eligible: internships.length, returned: ranked.total },
    );

    return {
      success: true,
      recommendations: ranked.recommendations.map((item) => ({
        internship: toInternshipPayload(item.internship),
        score: item.score,
        explanation: item.explanation,
      })),
      total: ranked.total,
      message: RECOMMENDATIONS_MESSAGE,
    };
  }
}

/**
 * Scores every posting, sorts by score descending and keeps the first
 * `limit`. Array#sort is stable, so equal scores keep their input order.
 */
export function rankInternships(
  profile: CandidateProfile,
  internships: ReadonlyArray<Internship>,
  limit = DEFAULT_RECOMMENDATION_LIMIT,
): RankedRecommendations {
  assertValidLimit(limit);
  assertNonNegative(profile.experienceYears, "experience_years", `candidate ${profile.id}`);

  const scored: ScoredInternship[] = internships.map((internship) => {
    assertNonNegative(internship.experienceRequired, "experience_required", `internship ${internship.id}`);
    const score = scoreInternship(profile, internship);
    return {
      internship,
      score,
      explanation: explainMatch(profile, internship, score),
    };
  });

  scored.sort((a, b) => b.score - a.score);
  const recommendations = scored.slice(0, limit);

  return {
    recommendations,
    total: recommendations.length,
  };
}

export function toInternshipPayload(internship: Internship): InternshipPayload {
  return {
    id: internship.id,
    title: internship.title,
    company: internship.company,
    location: internship.location ?? null,
    description: internship.description ?? null,
    required_skills: internship.requiredSkills ?? null,
    preferred_skills: internship.preferredSkills ?? null,
    duration: internship.duration ?? null,
    stipend: internship.stipend ?? null,
    application_deadline: internship.applicationDeadline ?? null,
    posted_date: internship.postedDate ?? null,
    is_active: internship.isActive,
    min_education: internship.minEducation ?? null,
    experience_required: internship.experienceRequired,
  };
}

function assertValidLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new MalformedInputError(`limit must be a non-negative integer, got ${limit}`, "limit");
  }
}

function assertNonNegative(value: number, field: string, owner: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidRecordError(`${field} must be a non-negative integer for ${owner}, got ${value}`, field);
  }
}
