/**
 * Keystone v3 session: token issue and service catalog lookup.
 */

import { Logger } from "@nestjs/common";
import { CLOUD_REQUEST_TIMEOUT_MS } from "@port-provider/core";
import { CloudApiError, CloudErrorType, errorTypeForStatus } from "../utils/cloud-errors";
import type { OpenStackAuthOptions } from "./cloud-config";
import { KeystoneTokenResponseSchema, type KeystoneCatalogEntry } from "./types";

export type FetchFn = typeof fetch;

export type ServiceType = "network" | "compute";

interface KeystoneToken {
  value: string;
  catalog: KeystoneCatalogEntry[];
}

/**
 * Build the body of a POST /v3/auth/tokens request.
 */
export function buildAuthRequest(options: OpenStackAuthOptions): Record<string, unknown> {
  const { credentials } = options;

  if (credentials.type === "application_credential") {
    return {
      auth: {
        identity: {
          methods: ["application_credential"],
          application_credential: { id: credentials.id, secret: credentials.secret },
        },
      },
    };
  }

  const user: Record<string, unknown> = { password: credentials.password };
  if (credentials.userId) {
    user.id = credentials.userId;
  } else {
    user.name = credentials.username;
    if (credentials.userDomainId) {
      user.domain = { id: credentials.userDomainId };
    } else if (credentials.userDomainName) {
      user.domain = { name: credentials.userDomainName };
    }
  }

  const auth: Record<string, unknown> = {
    identity: { methods: ["password"], password: { user } },
  };

  if (credentials.projectId) {
    auth.scope = { project: { id: credentials.projectId } };
  } else if (credentials.projectName) {
    const domain = credentials.projectDomainId
      ? { id: credentials.projectDomainId }
      : { name: credentials.projectDomainName ?? "Default" };
    auth.scope = { project: { name: credentials.projectName, domain } };
  }

  return { auth };
}

export class KeystoneSession {
  private readonly logger = new Logger(KeystoneSession.name);
  private token: KeystoneToken | null = null;

  constructor(
    private readonly options: OpenStackAuthOptions,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  /**
   * Return the current token, issuing one if needed.
   */
  async getToken(): Promise<string> {
    const token = this.token ?? (await this.authenticate());
    return token.value;
  }

  /**
   * Drop the cached token so the next request re-authenticates.
   */
  invalidate(): void {
    this.token = null;
  }

  /**
   * Resolve the public endpoint of a service from the token's catalog.
   */
  async getEndpoint(type: ServiceType): Promise<string> {
    const token = this.token ?? (await this.authenticate());
    const entry = token.catalog.find((candidate) => candidate.type === type);
    const endpoint = entry?.endpoints.find(
      (candidate) =>
        candidate.interface === "public" &&
        (!this.options.region ||
          candidate.region_id === this.options.region ||
          candidate.region === this.options.region)
    );

    if (!endpoint) {
      throw new CloudApiError(
        `No public '${type}' endpoint in the service catalog` +
          (this.options.region ? ` for region '${this.options.region}'` : ""),
        CloudErrorType.NOT_FOUND
      );
    }
    return endpoint.url.replace(/\/+$/, "");
  }

  private async authenticate(): Promise<KeystoneToken> {
    const url = `${this.options.authUrl.replace(/\/+$/, "")}/auth/tokens`;
    this.logger.debug(`Requesting token from ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(buildAuthRequest(this.options)),
        signal: AbortSignal.timeout(CLOUD_REQUEST_TIMEOUT_MS),
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CloudApiError(`Keystone unreachable: ${message}`, CloudErrorType.NETWORK, undefined, error);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new CloudApiError(
        `Keystone authentication failed: ${response.status} ${body}`,
        errorTypeForStatus(response.status),
        response.status
      );
    }

    const value = response.headers.get("X-Subject-Token");
    if (!value) {
      throw new CloudApiError("Keystone response has no X-Subject-Token header", CloudErrorType.AUTHENTICATION);
    }

    const { token } = KeystoneTokenResponseSchema.parse(await response.json());
    this.token = { value, catalog: token.catalog };
    return this.token;
  }
}
