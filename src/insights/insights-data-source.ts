import type { PopularInternship, SimilarUser, TrendingSkill } from "../shared/types/insights.types";
import snapshot from "./data/insights-snapshot.json";

/**
 * Market-level figures that are not derived from this gateway's own
 * tables. Swap the implementation to back insights with real aggregation.
 */
export interface InsightsDataSource {
  getApplicationSuccessRate(userId: number): Promise<number>;
  getLearningRecommendations(userId: number): Promise<string[]>;
  getPopularCompanies(): Promise<Record<string, number>>;
  getLocationDistribution(): Promise<Record<string, number>>;
  getTrendingSkills(): Promise<TrendingSkill[]>;
  getSimilarUsers(): Promise<SimilarUser[]>;
  getPopularInternships(): Promise<PopularInternship[]>;
  getSkillCorrelations(): Promise<Record<string, string[]>>;
}

export interface InsightsSnapshot {
  applicationSuccessRate: number;
  learningRecommendations: string[];
  popularCompanies: Record<string, number>;
  locationDistribution: Record<string, number>;
  trendingSkills: TrendingSkill[];
  similarUsers: SimilarUser[];
  popularInternships: PopularInternship[];
  skillCorrelations: Record<string, string[]>;
}

export const DEFAULT_INSIGHTS_SNAPSHOT: InsightsSnapshot = snapshot;

export class StaticInsightsDataSource implements InsightsDataSource {
  constructor(private readonly snapshot: InsightsSnapshot = DEFAULT_INSIGHTS_SNAPSHOT) {}

  async getApplicationSuccessRate(_userId: number): Promise<number> {
    return this.snapshot.applicationSuccessRate;
  }

  async getLearningRecommendations(_userId: number): Promise<string[]> {
    return [...this.snapshot.learningRecommendations];
  }

  async getPopularCompanies(): Promise<Record<string, number>> {
    return { ...this.snapshot.popularCompanies };
  }

  async getLocationDistribution(): Promise<Record<string, number>> {
    return { ...this.snapshot.locationDistribution };
  }

  async getTrendingSkills(): Promise<TrendingSkill[]> {
    return this.snapshot.trendingSkills.map((skill) => ({ ...skill }));
  }

  async getSimilarUsers(): Promise<SimilarUser[]> {
    return this.snapshot.similarUsers.map((user) => ({ ...user, common_skills: [...user.common_skills] }));
  }

  async getPopularInternships(): Promise<PopularInternship[]> {
    return this.snapshot.popularInternships.map((internship) => ({ ...internship }));
  }

  async getSkillCorrelations(): Promise<Record<string, string[]>> {
    return Object.fromEntries(
      Object.entries(this.snapshot.skillCorrelations).map(([skill, related]) => [skill, [...related]]),
    );
  }
}
