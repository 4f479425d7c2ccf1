import type { Logger } from "../commons";
import {
  describeError,
  SchemaResolutionError,
  TransientIOError,
} from "../errors";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../utils/backoff";

export const DEFAULT_SCHEMA_REGISTRY_URL = "http://localhost:8081";

// Registry error code for "Schema not found"
const SCHEMA_NOT_FOUND = 40403;

export interface RegistryResponse {
  status: number;
  json: () => Promise<unknown>;
}

/**
 * The subset of `fetch` the registry client relies on.
 */
export type RegistryFetch = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal },
) => Promise<RegistryResponse>;

export interface RegisteredSchema {
  id: number;
  schemaType: string;
  schema: string;
}

export interface SchemaRegistryClientOptions {
  url: string;
  logger: Logger;
  fetch?: RegistryFetch;
  retryPolicy?: RetryPolicy;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isRetryableStatus = (status: number): boolean =>
  status === 429 || status >= 500;

/**
 * Resolves writer schemas by id against a schema registry's HTTP API.
 */
export class SchemaRegistryClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly fetchFn: RegistryFetch;
  private readonly retryPolicy: RetryPolicy;
  private readonly abortController = new AbortController();

  constructor(options: SchemaRegistryClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.logger = options.logger;
    this.fetchFn = options.fetch ?? fetch;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Fetches the schema registered under `id`.
   *
   * @throws SchemaResolutionError when the registry does not know the id
   * @throws TransientIOError when the registry stays unreachable after retries
   */
  async getSchemaById(id: number): Promise<RegisteredSchema> {
    const url = `${this.baseUrl}/schemas/ids/${id}`;

    return withRetry(() => this.fetchSchema(id, url), {
      policy: this.retryPolicy,
      signal: this.abortController.signal,
      shouldRetry: (error) => error instanceof TransientIOError,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          `Schema registry lookup for id ${id} failed (attempt ${attempt}/${this.retryPolicy.retries}), retrying in ${delayMs}ms: ${describeError(error)}`,
        );
      },
    });
  }

  /**
   * Aborts in-flight requests; later lookups fail immediately.
   */
  close(): void {
    this.abortController.abort();
  }

  private async fetchSchema(
    id: number,
    url: string,
  ): Promise<RegisteredSchema> {
    if (this.abortController.signal.aborted) {
      throw new SchemaResolutionError(
        id,
        `Schema registry client is closed; cannot resolve schema id ${id}`,
      );
    }

    let response: RegistryResponse;
    try {
      response = await this.fetchFn(url, {
        headers: { Accept: "application/vnd.schemaregistry.v1+json" },
        signal: this.abortController.signal,
      });
    } catch (error) {
      throw new TransientIOError(
        `Schema registry request to ${url} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (isRetryableStatus(response.status)) {
      throw new TransientIOError(
        `Schema registry responded with HTTP ${response.status} for schema id ${id}`,
      );
    }

    const body = await this.readBody(id, response);

    if (response.status === 404 || body.error_code === SCHEMA_NOT_FOUND) {
      throw new SchemaResolutionError(
        id,
        `Schema id ${id} is not registered at ${this.baseUrl}`,
      );
    }
    if (response.status < 200 || response.status >= 300) {
      const detail = typeof body.message === "string" ? `: ${body.message}` : "";
      throw new SchemaResolutionError(
        id,
        `Schema registry rejected lookup of schema id ${id} with HTTP ${response.status}${detail}`,
      );
    }
    if (typeof body.schema !== "string") {
      throw new SchemaResolutionError(
        id,
        `Schema registry response for id ${id} carries no schema`,
      );
    }

    return {
      id,
      // The registry omits schemaType for Avro schemas
      schemaType: typeof body.schemaType === "string" ? body.schemaType : "AVRO",
      schema: body.schema,
    };
  }

  private async readBody(
    id: number,
    response: RegistryResponse,
  ): Promise<Record<string, unknown>> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SchemaResolutionError(
        id,
        `Schema registry returned an unreadable body for schema id ${id}`,
        { cause: error },
      );
    }
    return isObject(body) ? body : {};
  }
}
