/**
 * GitHub API Client
 *
 * Thin typed wrapper over the REST API for one access token.
 * 404 answers map to null; any other failure raises UnexpectedProviderResponse.
 */

import { logger } from "../../../utils/sharedLogger";
import { maskToken } from "../../../utils/logger";
import { UnexpectedProviderResponse } from "../errors";

// ============================================================================
// API Response Types
// ============================================================================

export interface GitHubUser {
  id: number;
  login: string;
  name: string | null;
  company?: string | null;
}

export interface GitHubLicense {
  key: string;
  spdx_id: string | null;
}

export interface GitHubRepo {
  id: number;
  name: string;
  full_name: string;
  html_url: string;
  description: string | null;
  default_branch: string;
  license?: GitHubLicense | null;
  owner: {
    id: number;
    login: string;
    type: "User" | "Organization" | "Bot";
  };
  permissions?: {
    admin?: boolean;
    maintain?: boolean;
    push?: boolean;
    pull?: boolean;
  };
}

export interface GitHubHook {
  id: number;
  name: string;
  events: string[];
  config: {
    url?: string;
    content_type?: string;
    insecure_ssl?: string;
  };
}

export interface GitHubHookConfig {
  url: string;
  content_type: "json";
  secret: string;
  insecure_ssl: "0" | "1";
}

export interface GitHubCollaborator {
  id: number;
  login: string;
  permissions?: {
    admin?: boolean;
  };
}

export interface GitHubContributor {
  id?: number;
  login?: string;
  type: string;
  contributions: number;
}

export interface GitHubFileContents {
  type: string;
  encoding: string;
  content: string;
}

const PER_PAGE = 100;

// ============================================================================
// GitHub API Client
// ============================================================================

export class GitHubApiClient {
  constructor(
    private readonly accessToken: string,
    private readonly baseUrl: string
  ) {}

  /**
   * Headers for authenticated requests
   */
  get authHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.accessToken}`,
      "X-GitHub-Api-Version": "2022-11-28",
    };
  }

  /**
   * Make an authenticated request to the GitHub API
   */
  private async send(path: string, options: RequestInit = {}): Promise<Response | null> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      ...options,
      headers: {
        ...this.authHeaders,
        Accept: "application/vnd.github+json",
        ...(options.body ? { "Content-Type": "application/json" } : {}),
        ...options.headers,
      },
    });

    if (response.status === 404) {
      return null;
    }

    if (!response.ok) {
      const errorBody = await response.text();
      logger.debug(
        {
          status: response.status,
          statusText: response.statusText,
          path,
          errorBody: errorBody.substring(0, 500),
          token: maskToken(this.accessToken),
        },
        "GitHub API request failed"
      );
      throw new UnexpectedProviderResponse("github", response.status, path);
    }

    return response;
  }

  private async request<T>(path: string, options: RequestInit = {}): Promise<T | null> {
    const response = await this.send(path, options);
    if (!response) {
      return null;
    }
    return response.json() as Promise<T>;
  }

  private async paginate<T>(path: string, limit = Infinity): Promise<T[] | null> {
    const items: T[] = [];
    const separator = path.includes("?") ? "&" : "?";
    let page = 1;

    while (items.length < limit) {
      const data = await this.request<T[]>(`${path}${separator}per_page=${PER_PAGE}&page=${page}`);
      if (!data) {
        return page === 1 ? null : items;
      }
      items.push(...data);
      if (data.length < PER_PAGE) {
        break;
      }
      page++;
    }

    return items.slice(0, limit);
  }

  // ============================================================================
  // User Methods
  // ============================================================================

  async getUser(): Promise<GitHubUser | null> {
    return this.request<GitHubUser>("/user");
  }

  async getUserByLogin(login: string): Promise<GitHubUser | null> {
    return this.request<GitHubUser>(`/users/${encodeURIComponent(login)}`);
  }

  // ============================================================================
  // Repository Methods
  // ============================================================================

  /**
   * Every repository the token can see, with the caller's permissions
   */
  async listRepositories(): Promise<GitHubRepo[]> {
    return (await this.paginate<GitHubRepo>("/user/repos")) ?? [];
  }

  async getRepository(repositoryId: string): Promise<GitHubRepo | null> {
    return this.request<GitHubRepo>(`/repositories/${repositoryId}`);
  }

  async listCollaborators(repositoryId: string): Promise<GitHubCollaborator[] | null> {
    return this.paginate<GitHubCollaborator>(`/repositories/${repositoryId}/collaborators`);
  }

  async listContributors(repositoryId: string, max: number): Promise<GitHubContributor[] | null> {
    return this.paginate<GitHubContributor>(`/repositories/${repositoryId}/contributors`, max);
  }

  async getFileContents(repositoryId: string, path: string, ref: string): Promise<GitHubFileContents | null> {
    const encodedPath = path.split("/").map(encodeURIComponent).join("/");
    return this.request<GitHubFileContents>(
      `/repositories/${repositoryId}/contents/${encodedPath}?ref=${encodeURIComponent(ref)}`
    );
  }

  // ============================================================================
  // Webhook Methods
  // ============================================================================

  async listHooks(repositoryId: string): Promise<GitHubHook[] | null> {
    return this.paginate<GitHubHook>(`/repositories/${repositoryId}/hooks`);
  }

  async getHook(repositoryId: string, hookId: string): Promise<GitHubHook | null> {
    return this.request<GitHubHook>(`/repositories/${repositoryId}/hooks/${hookId}`);
  }

  async createHook(repositoryId: string, hookConfig: GitHubHookConfig, events: string[]): Promise<GitHubHook | null> {
    return this.request<GitHubHook>(`/repositories/${repositoryId}/hooks`, {
      method: "POST",
      body: JSON.stringify({ name: "web", active: true, config: hookConfig, events }),
    });
  }

  async updateHook(repositoryId: string, hookId: number, hookConfig: GitHubHookConfig, events: string[]): Promise<GitHubHook | null> {
    return this.request<GitHubHook>(`/repositories/${repositoryId}/hooks/${hookId}`, {
      method: "PATCH",
      body: JSON.stringify({ config: hookConfig, events }),
    });
  }

  /**
   * @returns false when the hook no longer exists
   */
  async deleteHook(repositoryId: string, hookId: string): Promise<boolean> {
    const response = await this.send(`/repositories/${repositoryId}/hooks/${hookId}`, { method: "DELETE" });
    return response !== null;
  }

  // ============================================================================
  // OAuth Methods
  // ============================================================================

  /**
   * Revoke an OAuth token with the app's client credentials
   */
  static async revokeToken(
    baseUrl: string,
    clientId: string,
    clientSecret: string,
    accessToken: string
  ): Promise<void> {
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");
    const response = await fetch(`${baseUrl}/applications/${clientId}/token`, {
      method: "DELETE",
      headers: {
        Authorization: `Basic ${basic}`,
        Accept: "application/vnd.github+json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ access_token: accessToken }),
    });

    // 404: token already revoked
    if (!response.ok && response.status !== 404) {
      throw new UnexpectedProviderResponse("github", response.status, `/applications/${clientId}/token`);
    }
  }
}
