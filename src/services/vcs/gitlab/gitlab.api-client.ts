/**
 * GitLab API Client (REST v4)
 *
 * Same contract as the GitHub client: 404 maps to null, other failures raise
 * UnexpectedProviderResponse.
 */

import { logger } from "../../../utils/sharedLogger";
import { maskToken } from "../../../utils/logger";
import { UnexpectedProviderResponse } from "../errors";

// ============================================================================
// API Response Types
// ============================================================================

/** Maintainer, the lowest level allowed to manage hooks */
export const MAINTAINER_ACCESS = 40;

export interface GitLabUser {
  id: number;
  username: string;
  name: string | null;
}

export interface GitLabNamespace {
  id: number;
  name: string;
  path: string;
  kind: "user" | "group";
}

export interface GitLabProject {
  id: number;
  path_with_namespace: string;
  default_branch: string | null;
  web_url: string;
  description: string | null;
  license?: { key: string } | null;
  namespace: GitLabNamespace;
}

export interface GitLabHook {
  id: number;
  url: string;
  project_id: number;
  releases_events?: boolean;
}

export interface GitLabHookData {
  url: string;
  token: string;
  releases_events: true;
  description: string;
}

export interface GitLabMember {
  id: number;
  username: string;
  access_level: number;
}

export interface GitLabContributor {
  name: string;
  email: string;
  commits: number;
}

export interface GitLabFile {
  encoding: string;
  content: string;
}

const PER_PAGE = 100;

// ============================================================================
// GitLab API Client
// ============================================================================

export class GitLabApiClient {
  private readonly apiUrl: string;

  constructor(
    private readonly accessToken: string,
    baseUrl: string
  ) {
    this.apiUrl = `${baseUrl}/api/v4`;
  }

  get authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  private async send(path: string, options: RequestInit = {}): Promise<Response | null> {
    const response = await fetch(`${this.apiUrl}${path}`, {
      ...options,
      headers: {
        ...this.authHeaders,
        Accept: "application/json",
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
          path,
          errorBody: errorBody.substring(0, 500),
          token: maskToken(this.accessToken),
        },
        "GitLab API request failed"
      );
      throw new UnexpectedProviderResponse("gitlab", response.status, path);
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
  // Users
  // ============================================================================

  async getUser(): Promise<GitLabUser | null> {
    return this.request<GitLabUser>("/user");
  }

  async searchUsers(search: string): Promise<GitLabUser[]> {
    return (await this.request<GitLabUser[]>(`/users?search=${encodeURIComponent(search)}`)) ?? [];
  }

  // ============================================================================
  // Projects
  // ============================================================================

  /**
   * Projects where the user is at least maintainer. The list endpoint
   * carries no license.
   */
  async listProjects(): Promise<GitLabProject[]> {
    return (
      (await this.paginate<GitLabProject>(`/projects?min_access_level=${MAINTAINER_ACCESS}&simple=false`)) ?? []
    );
  }

  async getProject(projectId: string): Promise<GitLabProject | null> {
    return this.request<GitLabProject>(`/projects/${projectId}?license=true`);
  }

  async listContributors(projectId: string, max: number): Promise<GitLabContributor[] | null> {
    return this.paginate<GitLabContributor>(
      `/projects/${projectId}/repository/contributors?order_by=commits&sort=desc`,
      max
    );
  }

  async listMembers(projectId: string): Promise<GitLabMember[] | null> {
    return this.paginate<GitLabMember>(`/projects/${projectId}/members/all`);
  }

  async getFile(projectId: string, path: string, ref: string): Promise<GitLabFile | null> {
    return this.request<GitLabFile>(
      `/projects/${projectId}/repository/files/${encodeURIComponent(path)}?ref=${encodeURIComponent(ref)}`
    );
  }

  // ============================================================================
  // Hooks
  // ============================================================================

  async listHooks(projectId: string): Promise<GitLabHook[] | null> {
    return this.paginate<GitLabHook>(`/projects/${projectId}/hooks`);
  }

  async createHook(projectId: string, data: GitLabHookData): Promise<GitLabHook | null> {
    return this.request<GitLabHook>(`/projects/${projectId}/hooks`, {
      method: "POST",
      body: JSON.stringify(data),
    });
  }

  async updateHook(projectId: string, hookId: number, data: GitLabHookData): Promise<GitLabHook | null> {
    return this.request<GitLabHook>(`/projects/${projectId}/hooks/${hookId}`, {
      method: "PUT",
      body: JSON.stringify(data),
    });
  }

  async deleteHook(projectId: string, hookId: string): Promise<boolean> {
    const response = await this.send(`/projects/${projectId}/hooks/${hookId}`, { method: "DELETE" });
    return response !== null;
  }
}
