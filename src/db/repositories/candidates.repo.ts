import type { Logger } from "../../config/logger";
import { InvalidRecordError } from "../../shared/errors";
import type { CandidateAccount, CandidateProfile } from "../../shared/types/domain.types";
import type { RestReader } from "../supabase.client";

const CANDIDATES_TABLE = "candidates";
const ACCOUNT_COLUMNS =
  "id,email,password_hash,name,education,skills,location,experience_years,phone,linkedin,github";

interface CandidateRow {
  id: number;
  email: string;
  password_hash: string;
  name: string;
  education: string | null;
  skills: string | null;
  location: string | null;
  experience_years: unknown;
  phone: string | null;
  linkedin: string | null;
  github: string | null;
}

export class CandidatesRepository {
  constructor(
    private readonly logger: Logger,
    private readonly restReader?: RestReader,
  ) {}

  async getAccountById(candidateId: number): Promise<CandidateAccount | null> {
    if (!this.restReader) {
      return null;
    }
    const row = await this.restReader.selectOne<CandidateRow>(
      CANDIDATES_TABLE,
      { id: candidateId },
      ACCOUNT_COLUMNS,
    );
    return row ? toAccount(row) : null;
  }

  async getAccountByEmail(email: string): Promise<CandidateAccount | null> {
    if (!this.restReader) {
      return null;
    }
    const row = await this.restReader.selectOne<CandidateRow>(
      CANDIDATES_TABLE,
      { email },
      ACCOUNT_COLUMNS,
    );
    if (!row) {
      this.logger.debug("Candidate lookup by email returned no rows");
      return null;
    }
    return toAccount(row);
  }

  async getProfileById(candidateId: number): Promise<CandidateProfile | null> {
    const account = await this.getAccountById(candidateId);
    if (!account) {
      return null;
    }
    return {
      id: account.id,
      location: account.location,
      skills: account.skills,
      education: account.education,
      experienceYears: account.experienceYears,
    };
  }
}

function toAccount(row: CandidateRow): CandidateAccount {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    name: row.name,
    education: row.education ?? undefined,
    skills: row.skills ?? undefined,
    location: row.location ?? undefined,
    experienceYears: parseInteger(row.experience_years, "experience_years"),
    phone: row.phone ?? undefined,
    linkedin: row.linkedin ?? undefined,
    github: row.github ?? undefined,
  };
}

export function parseInteger(value: unknown, field: string): number {
  const parsed = typeof value === "string" && value.trim() ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed)) {
    throw new InvalidRecordError(`Expected integer for ${field}, got ${String(value)}`, field);
  }
  return parsed;
}
