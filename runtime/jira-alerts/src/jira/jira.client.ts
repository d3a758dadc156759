/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { MetricsService } from '../metrics/metrics.service';
import { JiraAction, TrackerError, TrackerRejectedError, TrackerUnreachableError } from './jira.errors';
import {
  CreatedIssue,
  IssueUpdate,
  NewIssue,
  ServerInfo,
  TrackerClient,
  TrackerIssue,
  Transition,
} from './tracker.interface';

export const JIRA_CLIENT_OPTIONS = Symbol('JIRA_CLIENT_OPTIONS');

export interface JiraClientOptions {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
}

const API = '/rest/api/2';
const SEARCH_FIELDS = ['summary', 'status', 'created', 'labels', 'description'];
const SEARCH_MAX_RESULTS = 50;

const IssueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string().default(''),
    status: z
      .object({
        name: z.string(),
        statusCategory: z.object({ key: z.string() }).optional(),
      })
      .optional(),
    created: z.string().default(''),
    labels: z.array(z.string()).default([]),
    description: z.string().nullish(),
  }),
});

const SearchResultSchema = z.object({
  issues: z.array(IssueSchema).default([]),
});

const CreatedIssueSchema = z.object({
  id: z.string(),
  key: z.string(),
});

const TransitionsSchema = z.object({
  transitions: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      to: z.object({ name: z.string() }).optional(),
    }),
  ),
});

const ServerInfoSchema = z.object({
  baseUrl: z.string(),
  version: z.string(),
  serverTitle: z.string().optional(),
});

const ErrorBodySchema = z.object({
  errorMessages: z.array(z.string()).default([]),
  errors: z.record(z.string()).default({}),
});

function jqlString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

// Jira writes offsets as +0000; Date.parse wants +00:00.
function normalizeTimestamp(value: string): string {
  return value.replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
}

function toTrackerIssue(issue: z.infer<typeof IssueSchema>): TrackerIssue {
  return {
    key: issue.key,
    summary: issue.fields.summary,
    status: issue.fields.status?.name ?? '',
    statusCategory: issue.fields.status?.statusCategory?.key ?? '',
    created: normalizeTimestamp(issue.fields.created),
    labels: issue.fields.labels,
    description: issue.fields.description ?? null,
  };
}

export function toTrackerError(action: JiraAction, error: unknown): TrackerError {
  if (error instanceof TrackerError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const body = ErrorBodySchema.safeParse(error.response.data);
      const messages = body.success
        ? [
            ...body.data.errorMessages,
            ...Object.entries(body.data.errors).map(([field, message]) => `${field}: ${message}`),
          ]
        : [];
      return new TrackerRejectedError(
        action,
        error.response.status,
        messages.length > 0 ? messages : [error.message],
      );
    }
    return new TrackerUnreachableError(action, error.code ? `${error.code}: ${error.message}` : error.message);
  }

  return new TrackerUnreachableError(action, error instanceof Error ? error.message : String(error));
}

/**
 * TrackerClient over the Jira REST API v2 with basic authentication. Every
 * call is a single attempt bounded by the configured timeout.
 */
@Injectable()
export class JiraClient implements TrackerClient {
  private readonly logger = new Logger(JiraClient.name);
  private readonly http: AxiosInstance;

  constructor(
    @Inject(JIRA_CLIENT_OPTIONS) private readonly options: JiraClientOptions,
    private readonly metricsService: MetricsService,
  ) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      auth: {
        username: options.username,
        password: options.password,
      },
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': 'jira-alerts/0.1.0',
      },
    });
  }

  async searchByFingerprint(project: string, fingerprintLabel: string): Promise<TrackerIssue[]> {
    const jql = `project = ${jqlString(project)} AND labels = ${jqlString(fingerprintLabel)} ORDER BY created DESC`;
    this.logger.debug(jql);

    const response = await this.request('search', () =>
      this.http.post<unknown>(`${API}/search`, {
        jql,
        fields: SEARCH_FIELDS,
        maxResults: SEARCH_MAX_RESULTS,
      }),
    );
    return this.parse('search', SearchResultSchema, response).issues.map(toTrackerIssue);
  }

  async createIssue(issue: NewIssue): Promise<CreatedIssue> {
    const response = await this.request('create', () =>
      this.http.post<unknown>(`${API}/issue`, {
        fields: {
          project: { key: issue.project },
          issuetype: { name: issue.issueType },
          summary: issue.summary,
          description: issue.description,
          labels: issue.labels,
        },
      }),
    );
    return this.parse('create', CreatedIssueSchema, response);
  }

  async listTransitions(issueKey: string): Promise<Transition[]> {
    const response = await this.request('transitions', () =>
      this.http.get<unknown>(`${API}/issue/${encodeURIComponent(issueKey)}/transitions`),
    );
    return this.parse('transitions', TransitionsSchema, response).transitions.map((transition) => ({
      id: transition.id,
      name: transition.name,
      to: transition.to?.name,
    }));
  }

  async executeTransition(issueKey: string, transitionId: string): Promise<void> {
    await this.request('transition', () =>
      this.http.post<unknown>(`${API}/issue/${encodeURIComponent(issueKey)}/transitions`, {
        transition: { id: transitionId },
      }),
    );
  }

  async updateIssue(issueKey: string, update: IssueUpdate): Promise<void> {
    await this.request('update', () =>
      this.http.put<unknown>(`${API}/issue/${encodeURIComponent(issueKey)}`, {
        fields: {
          summary: update.summary,
          description: update.description,
          labels: update.labels,
        },
      }),
    );
  }

  async serverInfo(): Promise<ServerInfo> {
    const response = await this.request('server_info', () => this.http.get<unknown>(`${API}/serverInfo`));
    return this.parse('server_info', ServerInfoSchema, response);
  }

  browseUrl(issueKey: string): string {
    return `${this.options.baseUrl}/browse/${issueKey}`;
  }

  private async request(
    action: JiraAction,
    send: () => Promise<AxiosResponse<unknown>>,
  ): Promise<AxiosResponse<unknown>> {
    const stopTimer = this.metricsService.startJiraTimer(action);
    try {
      return await send();
    } catch (error) {
      this.metricsService.incrementJiraErrors(action);
      throw toTrackerError(action, error);
    } finally {
      stopTimer();
    }
  }

  private parse<S extends z.ZodTypeAny>(
    action: JiraAction,
    schema: S,
    response: AxiosResponse<unknown>,
  ): z.infer<S> {
    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      this.metricsService.incrementJiraErrors(action);
      throw new TrackerRejectedError(
        action,
        response.status,
        parsed.error.issues.map((issue) => `unexpected response at ${issue.path.join('.') || '(body)'}: ${issue.message}`),
      );
    }
    return parsed.data;
  }
}
