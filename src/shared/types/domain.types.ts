export interface CandidateProfile {
  id: number;
  location?: string;
  skills?: string;
  education?: string;
  experienceYears: number;
}

export interface CandidateAccount extends CandidateProfile {
  email: string;
  name: string;
  passwordHash: string;
  phone?: string;
  linkedin?: string;
  github?: string;
}

export interface Internship {
  id: number;
  title: string;
  company: string;
  location?: string;
  description?: string;
  requiredSkills?: string;
  preferredSkills?: string;
  duration?: string;
  stipend?: string;
  applicationDeadline?: string;
  postedDate?: string;
  isActive: boolean;
  minEducation?: string;
  experienceRequired: number;
}

export interface BehaviorRecord {
  action?: string;
  skills?: string[];
  company?: string;
  location?: string;
}

export type ApplicationStatus = "pending" | "accepted" | "rejected" | (string & {});

export interface ApplicationRecord {
  id: number;
  candidateId: number;
  internshipId: number;
  appliedAt: string;
  status: ApplicationStatus;
}
