import type { Logger } from "../../config/logger";
import type { ApplicationRecord } from "../../shared/types/domain.types";
import type { RestReader } from "../supabase.client";

const APPLICATIONS_TABLE = "applications";

interface ApplicationRow {
  id: number;
  candidate_id: number;
  internship_id: number;
  applied_at: string;
  status: string;
}

export class ApplicationsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly restReader?: RestReader,
  ) {}

  async listAll(): Promise<ApplicationRecord[]> {
    if (!this.restReader) {
      return [];
    }
    const rows = await this.restReader.selectMany<ApplicationRow>(
      APPLICATIONS_TABLE,
      {},
      "id,candidate_id,internship_id,applied_at,status",
    );
    this.logger.debug("Applications loaded", { count: rows.length });
    return rows.map((row) => ({
      id: row.id,
      candidateId: row.candidate_id,
      internshipId: row.internship_id,
      appliedAt: row.applied_at,
      status: row.status,
    }));
  }
}
