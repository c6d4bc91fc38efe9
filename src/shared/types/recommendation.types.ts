import type { Internship } from "./domain.types";

export interface MatchBreakdown {
  location: number;
  skills: number;
  experience: number;
  education: number;
}

export interface MatchScore {
  score: number;
  breakdown: MatchBreakdown;
}

export interface ScoredInternship {
  internship: Internship;
  score: number;
  explanation: string;
}

export interface RankedRecommendations {
  recommendations: ScoredInternship[];
  total: number;
}

export interface InternshipPayload {
  id: number;
  title: string;
  company: string;
  location: string | null;
  description: string | null;
  required_skills: string | null;
  preferred_skills: string | null;
  duration: string | null;
  stipend: string | null;
  application_deadline: string | null;
  posted_date: string | null;
  is_active: boolean;
  min_education: string | null;
  experience_required: number;
}

export interface RecommendationPayload {
  internship: InternshipPayload;
  score: number;
  explanation: string;
}

export interface RecommendationResponse {
  success: boolean;
  recommendations: RecommendationPayload[];
  total: number;
  message: string;
}
