export interface UserInsights {
  total_interactions: number;
  action_breakdown: Record<string, number>;
  preferred_skills: Record<string, number>;
  preferred_companies: Record<string, number>;
  preferred_locations: Record<string, number>;
  application_success_rate: number;
  learning_recommendations: string[];
}

export interface MarketInsights {
  total_applications: number;
  success_rate: number;
  popular_companies: Record<string, number>;
  trending_skills: string[];
  location_distribution: Record<string, number>;
}

export interface SimilarUser {
  user_id: number;
  similarity_score: number;
  common_skills: string[];
}

export interface PopularInternship {
  internship_id: number;
  title: string;
  company: string;
  application_count: number;
  success_rate: number;
}

export interface CollaborativeInsights {
  similar_users: SimilarUser[];
  popular_internships: PopularInternship[];
  skill_correlations: Record<string, string[]>;
}

export interface TrendingSkill {
  skill: string;
  frequency: number;
  growth_rate: number;
}

export interface InsightsEnvelope<T> {
  success: boolean;
  insights: T;
  message: string;
}

export interface TrendingSkillsResponse {
  success: boolean;
  skills: TrendingSkill[];
  message: string;
}
