import type { Logger } from "../../config/logger";
import type { BehaviorRecord } from "../../shared/types/domain.types";
import type { RestReader } from "../supabase.client";

const BEHAVIORS_TABLE = "user_behaviors";

interface BehaviorRow {
  behavior_data: unknown;
}

export class BehaviorsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly restReader?: RestReader,
  ) {}

  async listForUser(userId: number): Promise<BehaviorRecord[]> {
    if (!this.restReader) {
      return [];
    }
    const rows = await this.restReader.selectMany<BehaviorRow>(
      BEHAVIORS_TABLE,
      { user_id: userId },
      "behavior_data",
    );

    // Unreadable payloads still count as interactions; they just carry no fields.
    let unreadable = 0;
    const records = rows.map((row): BehaviorRecord => {
      const record = parseBehavior(row.behavior_data);
      if (!record) {
        unreadable += 1;
        return {};
      }
      return record;
    });
    if (unreadable > 0) {
      this.logger.warn("Unreadable behavior records", { user_id: userId, unreadable });
    }
    return records;
  }
}

export function parseBehavior(raw: unknown): BehaviorRecord | null {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      return null;
    }
  }
  if (!isRecord(value)) {
    return null;
  }
  return {
    action: typeof value.action === "string" ? value.action : undefined,
    skills: Array.isArray(value.skills)
      ? value.skills.filter((skill): skill is string => typeof skill === "string")
      : undefined,
    company: typeof value.company === "string" ? value.company : undefined,
    location: typeof value.location === "string" ? value.location : undefined,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
