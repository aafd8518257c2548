/**
 * ServiceNow REST API Connector
 *
 * Talks to a ServiceNow instance through the Table API. Provides the raw
 * record layer the catalog gateway builds on: authenticated reads with
 * paging, single-record creates and updates, and a connectivity check.
 */

import { z } from "zod";

export type AuthMode = "basic" | "oauth_client_credentials" | "oauth_password";

export interface ServiceNowConfig {
  instanceUrl: string;
  authMode: AuthMode;
  // Basic auth
  username?: string;
  password?: string;
  // OAuth
  clientId?: string;
  clientSecret?: string;
  /** Records per Table API page */
  pageSize?: number;
}

export type ServiceNowRecord = Record<string, unknown>;

const TableResponseSchema = z.object({
  result: z.array(z.record(z.unknown())),
});

const RecordResponseSchema = z.object({
  result: z.record(z.unknown()),
});

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.coerce.number(),
});

export interface QueryOptions {
  query?: string;
  fields?: string[];
  limit?: number;
  offset?: number;
  signal?: AbortSignal;
}

const DEFAULT_PAGE_SIZE = 500;

/**
 * Read a field as plain text. Reference fields arrive as
 * `{ value, display_value, link }` objects; the raw value wins.
 */
export function fieldText(record: ServiceNowRecord, key: string): string {
  const raw = record[key];
  if (raw === null || raw === undefined) return "";
  if (typeof raw === "object" && "value" in raw) {
    const value = raw.value;
    return value === null || value === undefined ? "" : String(value);
  }
  return String(raw);
}

export class ServiceNowConnector {
  private config: ServiceNowConfig;
  private cachedToken: string | null = null;
  private tokenExpiry: number = 0;

  constructor(config: ServiceNowConfig) {
    this.config = config;
  }

  getInstanceUrl(): string {
    return this.config.instanceUrl;
  }

  getPageSize(): number {
    return this.config.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  /**
   * Get the Authorization header value, fetching/refreshing OAuth tokens as needed.
   */
  private async getAuthHeader(signal?: AbortSignal): Promise<string> {
    if (this.config.authMode === "basic") {
      return (
        "Basic " +
        Buffer.from(`${this.config.username ?? ""}:${this.config.password ?? ""}`).toString("base64")
      );
    }

    // OAuth: return cached token if still valid (with 60s buffer)
    if (this.cachedToken && Date.now() < this.tokenExpiry - 60_000) {
      return `Bearer ${this.cachedToken}`;
    }

    const tokenUrl = new URL("/oauth_token.do", this.config.instanceUrl);
    const body = new URLSearchParams();
    body.set("client_id", this.config.clientId ?? "");
    body.set("client_secret", this.config.clientSecret ?? "");

    if (this.config.authMode === "oauth_password") {
      body.set("grant_type", "password");
      body.set("username", this.config.username ?? "");
      body.set("password", this.config.password ?? "");
    } else {
      body.set("grant_type", "client_credentials");
    }

    const response = await fetch(tokenUrl.toString(), {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
      signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OAuth token request failed (${response.status}): ${text.substring(0, 200)}`);
    }

    const token = TokenResponseSchema.parse(await response.json());
    this.cachedToken = token.access_token;
    this.tokenExpiry = Date.now() + token.expires_in * 1000;

    return `Bearer ${this.cachedToken}`;
  }

  /**
   * Make an authenticated request to the ServiceNow REST API.
   */
  private async request(
    method: "GET" | "POST" | "PATCH",
    path: string,
    options: { params?: Record<string, string>; body?: unknown; signal?: AbortSignal } = {}
  ): Promise<unknown> {
    const url = new URL(path, this.config.instanceUrl);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      url.searchParams.set(key, value);
    }

    const authHeader = await this.getAuthHeader(options.signal);
    const response = await fetch(url.toString(), {
      method,
      headers: {
        Authorization: authHeader,
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: options.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`ServiceNow API error ${response.status}: ${text.substring(0, 200)}`);
    }

    return response.json();
  }

  /**
   * Test connectivity to the ServiceNow instance.
   */
  async testConnection(): Promise<{ success: boolean; message: string }> {
    try {
      await this.queryTable("sc_cat_item", { limit: 1, fields: ["sys_id"] });
      return { success: true, message: `Connected to ${this.config.instanceUrl}` };
    } catch (error) {
      return {
        success: false,
        message: `Failed to connect: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  /**
   * Query one page of records from a table.
   */
  async queryTable(tableName: string, options: QueryOptions = {}): Promise<ServiceNowRecord[]> {
    const params: Record<string, string> = {
      sysparm_limit: String(options.limit ?? 100),
      sysparm_display_value: "false",
      sysparm_exclude_reference_link: "true",
    };
    if (options.query) params.sysparm_query = options.query;
    if (options.fields) params.sysparm_fields = options.fields.join(",");
    if (options.offset) params.sysparm_offset = String(options.offset);

    const data = await this.request("GET", `/api/now/table/${encodeURIComponent(tableName)}`, {
      params,
      signal: options.signal,
    });
    return TableResponseSchema.parse(data).result;
  }

  /**
   * Read every record matching a query, page by page.
   */
  async queryAll(
    tableName: string,
    options: Omit<QueryOptions, "limit" | "offset"> = {}
  ): Promise<ServiceNowRecord[]> {
    const pageSize = this.getPageSize();
    const records: ServiceNowRecord[] = [];

    for (let offset = 0; ; offset += pageSize) {
      const page = await this.queryTable(tableName, { ...options, limit: pageSize, offset });
      records.push(...page);
      if (page.length < pageSize) break;
    }

    return records;
  }

  /**
   * Read one record by sys_id, or null when there is none.
   */
  async getRecord(
    tableName: string,
    sysId: string,
    options: Pick<QueryOptions, "fields" | "signal"> = {}
  ): Promise<ServiceNowRecord | null> {
    const rows = await this.queryTable(tableName, { ...options, query: `sys_id=${sysId}`, limit: 1 });
    return rows[0] ?? null;
  }

  /**
   * Insert a record and return it as stored.
   */
  async createRecord(
    tableName: string,
    body: Record<string, string | number | boolean>
  ): Promise<ServiceNowRecord> {
    const data = await this.request("POST", `/api/now/table/${encodeURIComponent(tableName)}`, {
      body,
      params: { sysparm_exclude_reference_link: "true" },
    });
    return RecordResponseSchema.parse(data).result;
  }

  /**
   * Patch a single record. Returns null when the instance returns no record.
   */
  async updateRecord(
    tableName: string,
    sysId: string,
    body: Record<string, string | number | boolean>
  ): Promise<ServiceNowRecord | null> {
    const data = await this.request(
      "PATCH",
      `/api/now/table/${encodeURIComponent(tableName)}/${encodeURIComponent(sysId)}`,
      { body, params: { sysparm_exclude_reference_link: "true" } }
    );
    const parsed = RecordResponseSchema.safeParse(data);
    if (!parsed.success || Object.keys(parsed.data.result).length === 0) return null;
    return parsed.data.result;
  }
}

/**
 * Create a connector from environment variables.
 * Detects auth mode automatically:
 *   - If SERVICENOW_CLIENT_ID is set without username/password: client_credentials
 *   - If SERVICENOW_CLIENT_ID is set with username/password: oauth_password
 *   - Otherwise: basic auth
 */
export function createConnectorFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ServiceNowConnector | null {
  const instanceUrl = env.SERVICENOW_INSTANCE_URL;
  if (!instanceUrl) return null;

  const username = env.SERVICENOW_USERNAME;
  const password = env.SERVICENOW_PASSWORD;
  const clientId = env.SERVICENOW_CLIENT_ID;
  const clientSecret = env.SERVICENOW_CLIENT_SECRET;
  const pageSize = env.SERVICENOW_PAGE_SIZE ? parseInt(env.SERVICENOW_PAGE_SIZE, 10) : undefined;

  let authMode: AuthMode;

  if (clientId && clientSecret && username && password) {
    authMode = "oauth_password";
  } else if (clientId && clientSecret) {
    authMode = "oauth_client_credentials";
  } else if (username && password) {
    authMode = "basic";
  } else {
    return null;
  }

  return new ServiceNowConnector({
    instanceUrl,
    authMode,
    username,
    password,
    clientId,
    clientSecret,
    pageSize: pageSize && pageSize > 0 ? pageSize : undefined,
  });
}
