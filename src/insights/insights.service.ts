import type { Logger } from "../config/logger";
import type { ApplicationsRepository } from "../db/repositories/applications.repo";
import type { BehaviorsRepository } from "../db/repositories/behaviors.repo";
import { MalformedInputError } from "../shared/errors";
import type { BehaviorRecord } from "../shared/types/domain.types";
import type {
  CollaborativeInsights,
  InsightsEnvelope,
  MarketInsights,
  TrendingSkillsResponse,
  UserInsights,
} from "../shared/types/insights.types";
import type { InsightsDataSource } from "./insights-data-source";

export const DEFAULT_TRENDING_SKILLS_LIMIT = 10;

export class InsightsService {
  constructor(
    private readonly behaviorsRepository: BehaviorsRepository,
    private readonly applicationsRepository: ApplicationsRepository,
    private readonly dataSource: InsightsDataSource,
    private readonly logger: Logger,
  ) {}

  async getUserInsights(userId: number): Promise<InsightsEnvelope<UserInsights>> {
    const [behaviors, applicationSuccessRate, learningRecommendations] = await Promise.all([
      this.behaviorsRepository.listForUser(userId),
      this.dataSource.getApplicationSuccessRate(userId),
      this.dataSource.getLearningRecommendations(userId),
    ]);

    const aggregate = aggregateBehaviors(behaviors);
    this.logger.debug("insights.user_aggregated", { user_id: userId, interactions: behaviors.length });

    return {
      success: true,
      insights: {
        total_interactions: behaviors.length,
        ...aggregate,
        application_success_rate: applicationSuccessRate,
        learning_recommendations: learningRecommendations,
      },
      message: "User insights generated successfully",
    };
  }

  async getMarketInsights(): Promise<InsightsEnvelope<MarketInsights>> {
    const [applications, popularCompanies, trendingSkills, locationDistribution] = await Promise.all([
      this.applicationsRepository.listAll(),
      this.dataSource.getPopularCompanies(),
      this.dataSource.getTrendingSkills(),
      this.dataSource.getLocationDistribution(),
    ]);

    const totalApplications = applications.length;
    const accepted = applications.filter((application) => application.status === "accepted").length;

    return {
      success: true,
      insights: {
        total_applications: totalApplications,
        success_rate: totalApplications > 0 ? accepted / totalApplications : 0,
        popular_companies: popularCompanies,
        trending_skills: trendingSkills.map((item) => item.skill),
        location_distribution: locationDistribution,
      },
      message: "Market insights generated successfully",
    };
  }

  async getCollaborativeInsights(): Promise<InsightsEnvelope<CollaborativeInsights>> {
    const [similarUsers, popularInternships, skillCorrelations] = await Promise.all([
      this.dataSource.getSimilarUsers(),
      this.dataSource.getPopularInternships(),
      this.dataSource.getSkillCorrelations(),
    ]);

    return {
      success: true,
      insights: {
        similar_users: similarUsers,
        popular_internships: popularInternships,
        skill_correlations: skillCorrelations,
      },
      message: "Collaborative insights generated successfully",
    };
  }

  async getTrendingSkills(limit = DEFAULT_TRENDING_SKILLS_LIMIT): Promise<TrendingSkillsResponse> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new MalformedInputError(`limit must be a non-negative integer, got ${limit}`, "limit");
    }
    const skills = await this.dataSource.getTrendingSkills();
    return {
      success: true,
      skills: skills.slice(0, limit),
      message: "Trending skills retrieved successfully",
    };
  }
}

export function aggregateBehaviors(behaviors: ReadonlyArray<BehaviorRecord>): Pick<
  UserInsights,
  "action_breakdown" | "preferred_skills" | "preferred_companies" | "preferred_locations"
> {
  const actionBreakdown: Record<string, number> = {};
  const preferredSkills: Record<string, number> = {};
  const preferredCompanies: Record<string, number> = {};
  const preferredLocations: Record<string, number> = {};

  for (const behavior of behaviors) {
    if (behavior.action) {
      increment(actionBreakdown, behavior.action);
    }
    for (const skill of behavior.skills ?? []) {
      increment(preferredSkills, skill);
    }
    if (behavior.company) {
      increment(preferredCompanies, behavior.company);
    }
    if (behavior.location) {
      increment(preferredLocations, behavior.location);
    }
  }

  return {
    action_breakdown: actionBreakdown,
    preferred_skills: preferredSkills,
    preferred_companies: preferredCompanies,
    preferred_locations: preferredLocations,
  };
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}
