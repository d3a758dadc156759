/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

export const TRACKER_CLIENT = Symbol('TRACKER_CLIENT');

export interface TrackerIssue {
  key: string;
  summary: string;
  status: string;
  // Jira status category key: "new", "indeterminate" or "done"
  statusCategory: string;
  created: string;
  labels: string[];
  description: string | null;
}

export interface Transition {
  id: string;
  name: string;
  to?: string;
}

export interface NewIssue {
  project: string;
  issueType: string;
  summary: string;
  description: string;
  labels: string[];
}

export interface CreatedIssue {
  id: string;
  key: string;
}

export interface IssueUpdate {
  summary: string;
  description: string;
  labels: string[];
}

export interface ServerInfo {
  baseUrl: string;
  version: string;
  serverTitle?: string;
}

/**
 * What the reconciler needs from an issue tracker. Implementations throw a
 * TrackerError when the tracker cannot be reached or refuses a call.
 */
export interface TrackerClient {
  searchByFingerprint(project: string, fingerprintLabel: string): Promise<TrackerIssue[]>;
  createIssue(issue: NewIssue): Promise<CreatedIssue>;
  listTransitions(issueKey: string): Promise<Transition[]>;
  executeTransition(issueKey: string, transitionId: string): Promise<void>;
  updateIssue(issueKey: string, update: IssueUpdate): Promise<void>;
  serverInfo(): Promise<ServerInfo>;
  browseUrl(issueKey: string): string;
}
