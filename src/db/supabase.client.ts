import fetch from "node-fetch";

export interface SupabaseRestClientConfig {
  url: string;
  serviceRoleKey: string;
}

export type RowFilters = Record<string, string | number | boolean>;

/** Read side of the PostgREST API; repositories depend on this, not on the HTTP client. */
export interface RestReader {
  selectOne<T>(table: string, filters: RowFilters, columns?: string): Promise<T | null>;
  selectMany<T>(table: string, filters: RowFilters, columns?: string): Promise<T[]>;
}

export class SupabaseRestClient implements RestReader {
  constructor(private readonly config: SupabaseRestClientConfig) {}

  async selectOne<T>(
    table: string,
    filters: RowFilters,
    columns = "*",
  ): Promise<T | null> {
    const rows = await this.selectMany<T>(table, filters, columns, 1);
    return rows[0] ?? null;
  }

  async selectMany<T>(
    table: string,
    filters: RowFilters,
    columns = "*",
    limit?: number,
  ): Promise<T[]> {
    const query = new URLSearchParams();
    query.set("select", columns);
    for (const [key, value] of Object.entries(filters)) {
      query.set(key, `eq.${String(value)}`);
    }
    if (typeof limit === "number") {
      query.set("limit", String(limit));
    }

    const response = await fetch(
      `${this.config.url}/rest/v1/${table}?${query.toString()}`,
      {
        method: "GET",
        headers: this.baseHeaders({
          accept: "application/json",
        }),
      },
    );

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase select failed: HTTP ${response.status} - ${body}`);
    }

    const rows: unknown = await response.json();
    if (!Array.isArray(rows)) {
      return [];
    }
    return rows as T[];
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.serviceRoleKey,
      authorization: `Bearer ${this.config.serviceRoleKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}
