import type { CandidateProfile, Internship } from "../../shared/types/domain.types";
import type { MatchBreakdown, MatchScore } from "../../shared/types/recommendation.types";

export const LOCATION_WEIGHT = 0.4;
export const SKILLS_WEIGHT = 0.35;
export const EXPERIENCE_WEIGHT = 0.15;
export const EDUCATION_WEIGHT = 0.1;

export function calculateMatchScore(profile: CandidateProfile, internship: Internship): MatchScore {
  const breakdown: MatchBreakdown = {
    location: scoreLocation(profile, internship),
    skills: scoreSkills(profile, internship),
    experience: scoreExperience(profile, internship),
    education: scoreEducation(profile, internship),
  };

  let total = 0;
  total += breakdown.location;
  total += breakdown.skills;
  total += breakdown.experience;
  total += breakdown.education;

  return {
    score: clampScore(total),
    breakdown,
  };
}

export function scoreInternship(profile: CandidateProfile, internship: Internship): number {
  return calculateMatchScore(profile, internship).score;
}

/** Either location may contain the other; no partial credit. */
function scoreLocation(profile: CandidateProfile, internship: Internship): number {
  if (!profile.location || !internship.location) {
    return 0;
  }
  const candidateLocation = profile.location.toLowerCase();
  const internshipLocation = internship.location.toLowerCase();
  if (candidateLocation.includes(internshipLocation) || internshipLocation.includes(candidateLocation)) {
    return LOCATION_WEIGHT;
  }
  return 0;
}

function scoreSkills(profile: CandidateProfile, internship: Internship): number {
  const requiredSkills = splitSkills(internship.requiredSkills);
  if (!requiredSkills.length) {
    return 0;
  }
  const matching = findMatchingSkills(splitSkills(profile.skills), requiredSkills);
  return SKILLS_WEIGHT * (matching.length / requiredSkills.length);
}

function scoreExperience(profile: CandidateProfile, internship: Internship): number {
  if (meetsExperienceRequirement(profile, internship)) {
    return EXPERIENCE_WEIGHT;
  }
  // experienceRequired > experienceYears >= 0 here, so the divisor is positive.
  return EXPERIENCE_WEIGHT * (profile.experienceYears / internship.experienceRequired);
}

function scoreEducation(profile: CandidateProfile, internship: Internship): number {
  if (!profile.education || !internship.minEducation) {
    return 0;
  }
  return profile.education.toLowerCase().includes(internship.minEducation.toLowerCase())
    ? EDUCATION_WEIGHT
    : 0;
}

export function meetsExperienceRequirement(profile: CandidateProfile, internship: Internship): boolean {
  return profile.experienceYears >= internship.experienceRequired;
}

/**
 * Comma-separated list, each entry trimmed. Empty entries are kept, so
 * `"Python, SQL,"` counts three required skills. A blank list has none.
 */
export function splitSkills(skills: string | undefined): string[] {
  if (!skills || !skills.trim()) {
    return [];
  }
  return skills.split(",").map((skill) => skill.trim());
}

/**
 * Profile skills (in profile order, duplicates kept) that appear as a
 * case-insensitive substring of at least one required skill.
 */
export function findMatchingSkills(profileSkills: string[], requiredSkills: string[]): string[] {
  const requiredLower = requiredSkills.map((skill) => skill.toLowerCase());
  return profileSkills.filter((skill) => {
    const skillLower = skill.toLowerCase();
    return requiredLower.some((required) => required.includes(skillLower));
  });
}

function clampScore(value: number): number {
  return Math.min(1, Math.max(0, value));
}
