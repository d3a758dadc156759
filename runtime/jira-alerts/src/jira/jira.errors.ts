/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

export type JiraAction = 'search' | 'create' | 'transitions' | 'transition' | 'update' | 'server_info';

export abstract class TrackerError extends Error {
  abstract readonly kind: 'TrackerUnreachable' | 'TrackerRejected';

  constructor(
    readonly action: JiraAction,
    message: string,
    readonly detail: string[],
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** No answer from Jira: connection refused, DNS failure, timeout. */
export class TrackerUnreachableError extends TrackerError {
  readonly kind = 'TrackerUnreachable' as const;

  constructor(action: JiraAction, reason: string) {
    super(action, `Jira unreachable during ${action}: ${reason}`, [reason]);
  }
}

/** Jira answered with an error status, or with a body we cannot read. */
export class TrackerRejectedError extends TrackerError {
  readonly kind = 'TrackerRejected' as const;

  constructor(
    action: JiraAction,
    readonly status: number,
    messages: string[],
  ) {
    super(action, `Jira rejected ${action} (HTTP ${status})`, messages);
  }
}
