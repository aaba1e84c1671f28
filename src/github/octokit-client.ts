import { Injectable, Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import type { RestEndpointMethodTypes } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';

import { SettingsService } from '../settings/settings.service.js';
import {
  GithubClientError,
  type ExternalCheckRun,
  type ExternalDirectoryEntry,
  type ExternalFileContent,
  type ExternalIssueComment,
  type ExternalPullRequest,
  type ExternalReview,
  type GithubClient,
  type ListPullsParams,
} from './github-client.interface.js';

// ---------- RESPONSE TYPES ----------
type PullListItem =
  RestEndpointMethodTypes['pulls']['list']['response']['data'][number];
type PullDetail = RestEndpointMethodTypes['pulls']['get']['response']['data'];
type PullListParams = RestEndpointMethodTypes['pulls']['list']['parameters'];

export function toClientError(error: unknown, operation: string): GithubClientError {
  if (error instanceof GithubClientError) return error;
  if (error instanceof RequestError) {
    const status = error.status;
    const message = `${operation}: ${error.message}`;
    if (status === 404) return new GithubClientError(message, 'NOT_FOUND', status);
    if (status === 401) return new GithubClientError(message, 'UNAUTHORIZED', status);
    if (status === 429 || (status === 403 && /rate limit/i.test(error.message))) {
      return new GithubClientError(message, 'RATE_LIMIT', status);
    }
    if (status >= 500) return new GithubClientError(message, 'SERVER_ERROR', status);
    return new GithubClientError(message, 'UNKNOWN', status);
  }
  const text = error instanceof Error ? error.message : String(error);
  return new GithubClientError(`${operation}: ${text}`, 'UNKNOWN');
}

function mapPull(p: PullListItem | PullDetail): ExternalPullRequest {
  const mergedAt = p.merged_at ?? null;
  return {
    id: String(p.id),
    number: Number(p.number),
    title: p.title,
    state: p.state === 'closed' ? 'closed' : 'open',
    merged: 'merged' in p && typeof p.merged === 'boolean' ? p.merged : mergedAt !== null,
    createdAt: p.created_at,
    updatedAt: p.updated_at,
    closedAt: p.closed_at ?? null,
    mergedAt,
    labels: (p.labels ?? [])
      .map((l) => l.name)
      .filter((name): name is string => typeof name === 'string' && name.length > 0),
    authorLogin: p.user?.login ?? null,
    headSha: p.head?.sha ?? null,
    mergeCommitSha: p.merge_commit_sha ?? null,
  };
}

@Injectable()
export class OctokitClient implements GithubClient {
  private readonly logger = new Logger(OctokitClient.name);
  private readonly octokit: Octokit;

  constructor(private readonly settings: SettingsService) {
    this.octokit = new Octokit({
      auth: settings.current.github.token,
      userAgent: 'pr-sync-service/1.0',
      request: { headers: { accept: 'application/vnd.github+json' } },
    });
  }

  private get repoRef() {
    const { owner, repo } = this.settings.current.github;
    return { owner, repo };
  }

  private async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private async retryWithBackoff<T>(
    fn: () => Promise<T>,
    operation: string,
    maxRetries = 5,
    baseDelay = 2000,
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error: unknown) {
        const clientError = toClientError(error, operation);

        if (!clientError.retryable || attempt >= maxRetries) {
          if (clientError.retryable) {
            this.logger.warn(`❌ ${operation} failed after ${maxRetries} attempts: ${clientError.message}`);
          }
          throw clientError;
        }

        const delay = baseDelay * Math.pow(2, attempt - 1); // exponential backoff
        this.logger.warn(
          `⏳ ${operation} ${clientError.code === 'RATE_LIMIT' ? 'rate limited' : 'server error'}, attempt ${attempt}/${maxRetries}, waiting ${delay}ms`,
        );
        await this.sleep(delay);
      }
    }
  }

  // ---------- PULL REQUESTS ----------
  async *iteratePullRequests(params: ListPullsParams): AsyncIterable<ExternalPullRequest> {
    const payload: PullListParams = {
      ...this.repoRef,
      state: params.state,
      sort: params.sort,
      direction: params.direction,
      per_page: 100,
    };

    const pages = this.octokit.paginate.iterator(this.octokit.pulls.list, payload);
    try {
      for await (const page of pages) {
        for (const item of page.data) {
          yield mapPull(item);
        }
      }
    } catch (error: unknown) {
      throw toClientError(error, 'List pull requests');
    }
  }

  async getPullRequest(params: { pullNumber: number }): Promise<ExternalPullRequest> {
    const { data } = await this.retryWithBackoff(
      () => this.octokit.pulls.get({ ...this.repoRef, pull_number: params.pullNumber }),
      `Get PR #${params.pullNumber}`,
    );
    return mapPull(data);
  }

  async listPullRequestFiles(params: { pullNumber: number }): Promise<string[]> {
    const files = await this.retryWithBackoff(
      () =>
        this.octokit.paginate(this.octokit.pulls.listFiles, {
          ...this.repoRef,
          pull_number: params.pullNumber,
          per_page: 100,
        }),
      `Files of PR #${params.pullNumber}`,
    );
    return files.map((f) => f.filename);
  }

  // ---------- REVIEWS & CHECKS ----------
  async listReviews(params: { pullNumber: number }): Promise<ExternalReview[]> {
    const reviews = await this.retryWithBackoff(
      () =>
        this.octokit.paginate(this.octokit.pulls.listReviews, {
          ...this.repoRef,
          pull_number: params.pullNumber,
          per_page: 100,
        }),
      `Reviews of PR #${params.pullNumber}`,
    );

    return reviews.map((r) => ({
      id: String(r.id),
      reviewerLogin: r.user?.login ?? null,
      state: r.state,
      submittedAt: r.submitted_at ?? null,
      body: r.body ?? null,
    }));
  }

  async listCheckRuns(params: { ref: string }): Promise<ExternalCheckRun[]> {
    const runs = await this.retryWithBackoff(
      () =>
        this.octokit.paginate(this.octokit.checks.listForRef, {
          ...this.repoRef,
          ref: params.ref,
          per_page: 100,
        }),
      `Check runs for ${params.ref}`,
    );

    return runs.map((c) => ({
      id: String(c.id),
      name: c.name,
      status: c.status,
      conclusion: c.conclusion ?? null,
      startedAt: c.started_at ?? null,
      completedAt: c.completed_at ?? null,
    }));
  }

  // ---------- ISSUE COMMENTS ----------
  async listIssueComments(params: { issueNumber: number }): Promise<ExternalIssueComment[]> {
    const comments = await this.retryWithBackoff(
      () =>
        this.octokit.paginate(this.octokit.issues.listComments, {
          ...this.repoRef,
          issue_number: params.issueNumber,
          per_page: 100,
        }),
      `Comments of #${params.issueNumber}`,
    );

    return comments.map((c) => ({
      id: String(c.id),
      authorLogin: c.user?.login ?? null,
      authorIsBot: c.user?.type === 'Bot' || (c.user?.login ?? '').endsWith('[bot]'),
      body: c.body ?? '',
      createdAt: c.created_at ?? null,
    }));
  }

  // ---------- CONTENTS ----------
  async getFileContent(params: { path: string; ref?: string }): Promise<ExternalFileContent | null> {
    const operation = `Contents ${params.path}${params.ref ? `@${params.ref}` : ''}`;
    try {
      const { data } = await this.retryWithBackoff(
        () =>
          this.octokit.repos.getContent({
            ...this.repoRef,
            path: params.path,
            ...(params.ref ? { ref: params.ref } : {}),
          }),
        operation,
      );

      if (Array.isArray(data) || !('content' in data) || typeof data.content !== 'string') {
        return null;
      }

      // Files over 1MB come back without inline content.
      if (data.content.length === 0 && data.sha) {
        const blob = await this.retryWithBackoff(
          () => this.octokit.git.getBlob({ ...this.repoRef, file_sha: data.sha }),
          `Blob ${data.sha}`,
        );
        return {
          path: params.path,
          ref: params.ref ?? null,
          content: Buffer.from(blob.data.content, blob.data.encoding === 'base64' ? 'base64' : 'utf8'),
        };
      }

      const encoding = 'encoding' in data && data.encoding === 'base64' ? 'base64' : 'utf8';
      return {
        path: params.path,
        ref: params.ref ?? null,
        content: Buffer.from(data.content, encoding),
      };
    } catch (error: unknown) {
      const clientError = toClientError(error, operation);
      if (clientError.code === 'NOT_FOUND') return null;
      throw clientError;
    }
  }

  async listDirectory(params: { path: string }): Promise<ExternalDirectoryEntry[]> {
    const { data } = await this.retryWithBackoff(
      () => this.octokit.repos.getContent({ ...this.repoRef, path: params.path }),
      `Directory ${params.path || '/'}`,
    );
    if (!Array.isArray(data)) return [];

    return data.map((entry) => ({
      name: entry.name,
      path: entry.path,
      type: entry.type === 'dir' ? 'dir' : entry.type === 'file' ? 'file' : 'other',
    }));
  }
}
