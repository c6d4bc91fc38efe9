import type { Logger } from "../../config/logger";
import type { Internship } from "../../shared/types/domain.types";
import type { RestReader } from "../supabase.client";
import { parseInteger } from "./candidates.repo";

const INTERNSHIPS_TABLE = "internships";
const INTERNSHIP_COLUMNS =
  "id,title,company,location,description,required_skills,preferred_skills,duration,stipend,application_deadline,posted_date,is_active,min_education,experience_required";

interface InternshipRow {
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
  is_active: boolean | number;
  min_education: string | null;
  experience_required: unknown;
}

export class InternshipsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly restReader?: RestReader,
  ) {}

  async listActive(): Promise<Internship[]> {
    if (!this.restReader) {
      return [];
    }
    const rows = await this.restReader.selectMany<InternshipRow>(
      INTERNSHIPS_TABLE,
      { is_active: true },
      INTERNSHIP_COLUMNS,
    );
    const internships = rows.map(toInternship).filter((internship) => internship.isActive);
    this.logger.debug("Active internships loaded", { count: internships.length });
    return internships;
  }
}

function toInternship(row: InternshipRow): Internship {
  return {
    id: row.id,
    title: row.title,
    company: row.company,
    location: row.location ?? undefined,
    description: row.description ?? undefined,
    requiredSkills: row.required_skills ?? undefined,
    preferredSkills: row.preferred_skills ?? undefined,
    duration: row.duration ?? undefined,
    stipend: row.stipend ?? undefined,
    applicationDeadline: row.application_deadline ?? undefined,
    postedDate: row.posted_date ?? undefined,
    isActive: row.is_active === true || row.is_active === 1,
    minEducation: row.min_education ?? undefined,
    experienceRequired: parseInteger(row.experience_required, "experience_required"),
  };
}
