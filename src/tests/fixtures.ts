import type { Logger } from "../config/logger";
import type { RestReader, RowFilters } from "../db/supabase.client";
import type { CandidateProfile, Internship } from "../shared/types/domain.types";

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function buildProfile(overrides: Partial<CandidateProfile> = {}): CandidateProfile {
  return {
    id: 1,
    location: "San Francisco",
    skills: "Python, React",
    education: "Bachelors",
    experienceYears: 2,
    ...overrides,
  };
}

export function buildInternship(overrides: Partial<Internship> = {}): Internship {
  return {
    id: 100,
    title: "Backend Intern",
    company: "Acme Labs",
    location: "San Francisco, CA",
    requiredSkills: "Python, SQL",
    isActive: true,
    minEducation: "Bachelors",
    experienceRequired: 1,
    ...overrides,
  };
}

/** In-memory PostgREST stand-in: equality filters over plain row objects. */
export class FakeRestReader implements RestReader {
  public readonly calls: Array<{ table: string; filters: RowFilters }> = [];

  constructor(private readonly tables: Record<string, Array<Record<string, unknown>>>) {}

  async selectOne<T>(table: string, filters: RowFilters): Promise<T | null> {
    const rows = await this.selectMany<T>(table, filters);
    return rows[0] ?? null;
  }

  async selectMany<T>(table: string, filters: RowFilters): Promise<T[]> {
    this.calls.push({ table, filters });
    const rows = this.tables[table] ?? [];
    return rows.filter((row) =>
      Object.entries(filters).every(([key, value]) => row[key] === value),
    ) as T[];
  }
}
