/**
 * STS Credential Provider
 *
 * Assumes the log-reader role through Alibaba Cloud STS and caches the
 * temporary credentials until shortly before they expire.
 */

import * as $OpenApi from "@alicloud/openapi-client";
import Sts20150401, * as $Sts20150401 from "@alicloud/sts20150401";
import {
  CredentialError,
  getLogger,
  type CredentialProvider,
  type Credentials,
  type Logger,
} from "@faultline/shared";
import type { StsSettings } from "../lib/config";

// ============================================
// Types
// ============================================

export interface AssumeRoleParams {
  roleArn: string;
  roleSessionName: string;
  durationSeconds: number;
}

/** The one STS call this provider needs */
export interface AssumeRoleApi {
  assumeRole(params: AssumeRoleParams): Promise<Credentials>;
}

export type AssumeRoleApiFactory = (settings: StsSettings) => AssumeRoleApi;

export interface StsCredentialProviderOptions {
  createApi?: AssumeRoleApiFactory;
  /** Refresh this long before expiry (ms) */
  refreshMarginMs?: number;
  now?: () => number;
  logger?: Logger;
}

const DEFAULT_REFRESH_MARGIN_MS = 5 * 60 * 1000;

const TROUBLESHOOTING_HINT =
  "check that the main account access key is correct, the role ARN exists, " +
  "and the role's trust policy allows this account to assume it";

// ============================================
// SDK Adapter
// ============================================

/**
 * AssumeRole through the official STS SDK.
 */
export const createStsApi: AssumeRoleApiFactory = (settings) => {
  const client = new Sts20150401(
    new $OpenApi.Config({
      accessKeyId: settings.accessKeyId,
      accessKeySecret: settings.accessKeySecret,
      endpoint: `sts.${settings.region}.aliyuncs.com`,
    })
  );

  return {
    async assumeRole(params) {
      const response = await client.assumeRole(
        new $Sts20150401.AssumeRoleRequest({
          roleArn: params.roleArn,
          roleSessionName: params.roleSessionName,
          durationSeconds: params.durationSeconds,
        })
      );

      const credentials = response.body?.credentials;
      const expiration = credentials?.expiration
        ? Date.parse(credentials.expiration)
        : Number.NaN;

      return {
        accessKeyId: credentials?.accessKeyId ?? "",
        accessKeySecret: credentials?.accessKeySecret ?? "",
        securityToken: credentials?.securityToken ?? "",
        expiresAt: Number.isFinite(expiration) ? expiration : undefined,
      };
    },
  };
};

// ============================================
// Provider
// ============================================

export function isCompleteCredentials(credentials: Credentials): boolean {
  return Boolean(
    credentials.accessKeyId && credentials.accessKeySecret && credentials.securityToken
  );
}

export class StsCredentialProvider implements CredentialProvider {
  private readonly createApi: AssumeRoleApiFactory;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private api: AssumeRoleApi | null = null;
  private cached: Credentials | null = null;
  private pending: Promise<Credentials> | null = null;

  constructor(
    private readonly settings: StsSettings,
    options: StsCredentialProviderOptions = {}
  ) {
    this.createApi = options.createApi ?? createStsApi;
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Cached credentials while still fresh; otherwise one AssumeRole call shared
   * by every concurrent caller.
   *
   * @throws CredentialError
   */
  async getValidCredentials(): Promise<Credentials> {
    if (this.cached && this.isFresh(this.cached)) {
      return this.cached;
    }

    if (!this.pending) {
      this.pending = this.fetchCredentials().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.cached = null;
  }

  private isFresh(credentials: Credentials): boolean {
    if (credentials.expiresAt === undefined) return true;
    return credentials.expiresAt - this.refreshMarginMs > this.now();
  }

  private async fetchCredentials(): Promise<Credentials> {
    const { accessKeyId, accessKeySecret, roleArn } = this.settings;
    if (!accessKeyId || !accessKeySecret || !roleArn) {
      throw new CredentialError(
        "Missing ALIBABA_CLOUD_ACCESS_KEY_ID, ALIBABA_CLOUD_ACCESS_KEY_SECRET or ALIBABA_CLOUD_ROLE_ARN"
      );
    }

    let credentials: Credentials;
    try {
      this.api ??= this.createApi(this.settings);
      credentials = await this.api.assumeRole({
        roleArn,
        roleSessionName: this.settings.sessionName,
        durationSeconds: this.settings.durationSeconds,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CredentialError(
        `STS AssumeRole failed: ${message} (${TROUBLESHOOTING_HINT})`,
        error
      );
    }

    if (!isCompleteCredentials(credentials)) {
      throw new CredentialError("STS AssumeRole returned incomplete credentials");
    }

    this.cached = credentials;
    this.logger.info("[credentials] Assumed role", {
      roleArn,
      expiresAt:
        credentials.expiresAt !== undefined
          ? new Date(credentials.expiresAt).toISOString()
          : null,
    });
    return credentials;
  }
}
