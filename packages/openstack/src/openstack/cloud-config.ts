/**
 * Reader for the cloud controller manager's cloud.config.
 *
 * The [Global] section carries the Keystone credentials the agent reuses:
 *
 * ```ini
 * [Global]
 * auth-url="https://keystone.example.com:5000/v3"
 * application-credential-id="..."
 * application-credential-secret="..."
 * region="RegionOne"
 * ```
 */

import fs from "fs-extra";
import { parse } from "ini";
import { z } from "zod";
import { ConfigurationError } from "@port-provider/core";

export interface PasswordCredentials {
  type: "password";
  username?: string;
  userId?: string;
  password: string;
  userDomainName?: string;
  userDomainId?: string;
  projectId?: string;
  projectName?: string;
  projectDomainName?: string;
  projectDomainId?: string;
}

export interface ApplicationCredentials {
  type: "application_credential";
  id: string;
  secret: string;
}

export interface OpenStackAuthOptions {
  authUrl: string;
  region?: string;
  credentials: PasswordCredentials | ApplicationCredentials;
}

const sectionSchema = z.record(z.unknown());

/**
 * Take the global section of a parsed cloud.config, dropping quotes and empty values.
 */
export function extractGlobalSection(content: string): Record<string, string> {
  const parsed = sectionSchema.parse(parse(content));
  const sectionName = Object.keys(parsed).find((name) => name.toLowerCase() === "global");
  if (!sectionName) {
    throw new ConfigurationError("Cloud config has no [Global] section");
  }

  const section = sectionSchema.safeParse(parsed[sectionName]);
  if (!section.success) {
    throw new ConfigurationError("Cloud config [Global] section is not a key/value section");
  }

  const options: Record<string, string> = {};
  for (const [key, value] of Object.entries(section.data)) {
    if (typeof value !== "string") continue;
    const unquoted = value.replace(/^"|"$/g, "");
    if (unquoted) {
      options[key.toLowerCase()] = unquoted;
    }
  }
  return options;
}

/**
 * Build Keystone auth options from the global section of a cloud.config.
 * An application credential takes precedence over user/password.
 */
export function toAuthOptions(options: Record<string, string>): OpenStackAuthOptions {
  const authUrl = options["auth-url"];
  if (!authUrl) {
    throw new ConfigurationError("Cloud config is missing 'auth-url'");
  }

  const region = options["region"];
  const appCredentialId = options["application-credential-id"];

  if (appCredentialId) {
    const secret = options["application-credential-secret"];
    if (!secret) {
      throw new ConfigurationError("Cloud config is missing 'application-credential-secret'");
    }
    return {
      authUrl,
      region,
      credentials: { type: "application_credential", id: appCredentialId, secret },
    };
  }

  const password = options["password"];
  if (!password || (!options["username"] && !options["user-id"])) {
    throw new ConfigurationError(
      "Cloud config needs either an application credential or a username/user-id and password"
    );
  }

  const domainName = options["domain-name"];
  const domainId = options["domain-id"];

  return {
    authUrl,
    region,
    credentials: {
      type: "password",
      username: options["username"],
      userId: options["user-id"],
      password,
      userDomainName: options["user-domain-name"] ?? domainName,
      userDomainId: options["user-domain-id"] ?? domainId,
      projectId: options["tenant-id"] ?? options["project-id"],
      projectName: options["tenant-name"] ?? options["project-name"],
      projectDomainName:
        options["tenant-domain-name"] ?? options["project-domain-name"] ?? domainName,
      projectDomainId: options["tenant-domain-id"] ?? options["project-domain-id"] ?? domainId,
    },
  };
}

/**
 * Read and interpret a cloud.config file.
 */
export async function readCloudConfig(path: string): Promise<OpenStackAuthOptions> {
  const content = await fs.readFile(path, "utf8");
  return toAuthOptions(extractGlobalSection(content));
}
