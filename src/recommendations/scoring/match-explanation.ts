import type { CandidateProfile, Internship } from "../../shared/types/domain.types";
import { findMatchingSkills, meetsExperienceRequirement, splitSkills } from "./match-score";

export const FALLBACK_REASON = "Based on your profile and preferences";

export function explainMatch(profile: CandidateProfile, internship: Internship, score: number): string {
  const reasons: string[] = [];

  // One direction only: the candidate's location must contain the posting's.
  if (
    profile.location &&
    internship.location &&
    profile.location.toLowerCase().includes(internship.location.toLowerCase())
  ) {
    reasons.push(`Location match: ${profile.location} and ${internship.location}`);
  }

  const matchingSkills = findMatchingSkills(splitSkills(profile.skills), splitSkills(internship.requiredSkills));
  if (matchingSkills.length) {
    reasons.push(`Skills match: ${matchingSkills.join(", ")}`);
  }

  if (meetsExperienceRequirement(profile, internship)) {
    reasons.push(`Experience requirement met: ${profile.experienceYears} years`);
  }

  if (!reasons.length) {
    reasons.push(FALLBACK_REASON);
  }

  return `Score: ${(score * 100).toFixed(1)}% - ${reasons.join(", ")}`;
}
