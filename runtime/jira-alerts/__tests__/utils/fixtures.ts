/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { AlertGroup, AlertGroupPayload, AlertGroupSchema } from '../../src/alertmanager/alertmanager.schema';
import { EnvOverrides } from '../../src/config/env';
import { TrackerIssue } from '../../src/jira/tracker.interface';

export const JIRA_URL = 'http://jira.test';

// sha1('alertname="Foo_Bar",instance="foo"'), first 10 hex digits
export const FOO_BAR_FINGERPRINT = '5b67acb40d';

export function firingPayload(): AlertGroupPayload {
  return {
    version: '4',
    groupKey: '{}/{}:{alertname="Foo_Bar", instance="foo"}',
    status: 'firing',
    receiver: 'jiralert',
    groupLabels: { alertname: 'Foo_Bar', instance: 'foo' },
    commonLabels: { alertname: 'Foo_Bar', instance: 'foo' },
    commonAnnotations: {
      link: 'https://example.com/Foo+Bar',
      summary: 'Alert summary',
    },
    externalURL: 'https://alertmanager.example.com',
    alerts: [
      {
        status: 'firing',
        labels: { alertname: 'Foo_Bar', instance: 'foo' },
        annotations: {
          link: 'https://example.com/Foo+Bar',
          summary: 'Alert summary',
        },
        startsAt: '2017-02-02T16:51:13.507955756Z',
        endsAt: '0001-01-01T00:00:00Z',
        generatorURL: 'https://example.com',
      },
    ],
  };
}

export function resolvedPayload(): AlertGroupPayload {
  const payload = firingPayload();
  return {
    ...payload,
    status: 'resolved',
    alerts: (payload.alerts ?? []).map((alert) => ({ ...alert, status: 'resolved' as const })),
  };
}

export function alertGroup(payload: AlertGroupPayload = firingPayload()): AlertGroup {
  return AlertGroupSchema.parse(payload);
}

export function trackerIssue(overrides: Partial<TrackerIssue> = {}): TrackerIssue {
  return {
    key: 'ABC-1',
    summary: 'Foo_Bar: Alert summary',
    status: 'Open',
    statusCategory: 'new',
    created: '2024-03-01T10:00:00.000+00:00',
    labels: ['alert', `jiralert:${FOO_BAR_FINGERPRINT}`],
    description: null,
    ...overrides,
  };
}

/** Every variable spelled out, so nothing leaks in from the process environment. */
export function testEnv(overrides: EnvOverrides = {}): EnvOverrides {
  return {
    PORT: '9050',
    LOG_LEVEL: 'error',
    ALLOWED_ORIGINS: '*',
    MAX_BODY_SIZE: '10mb',
    JIRA_URL,
    JIRA_USERNAME: 'test-user',
    JIRA_PASSWORD: 'test-secret',
    JIRA_TIMEOUT_MS: '1000',
    RESOLVE_TRANSITIONS: 'Close,Done,Resolve',
    REOPEN_TRANSITIONS: 'Reopen,In Progress',
    RESOLVED_STATUS: 'resolved,closed,done',
    FINGERPRINT_LABEL_PREFIX: 'jiralert',
    UPDATE_EXISTING_ISSUES: 'false',
    ...overrides,
  };
}
