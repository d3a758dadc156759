/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Alert, AlertGroup } from './alertmanager.schema';
import { canonicalLabels } from './fingerprint';

// Everything below this line in a description belongs to the service.
export const DESCRIPTION_BOUNDARY = '_-- Alertmanager -- [only edit above]_';

export const SUMMARY_MAX_LENGTH = 255;

const TAG_ALLOW_LIST = ['severity', 'dc', 'env', 'perimeter', 'team', 'jiralert'];

export function renderSummary(group: AlertGroup): string {
  const name: string | undefined = group.commonLabels['alertname'] ?? group.groupLabels['alertname'];
  const summary: string | undefined = group.commonAnnotations['summary'];

  let text: string;
  if (name && summary) {
    text = `${name}: ${summary}`;
  } else if (name || summary) {
    text = name || summary || '';
  } else {
    const labels = canonicalLabels(group.groupLabels);
    text = labels ? `Alert group {${labels}}` : 'Alert group';
  }

  // Cut on code points so a surrogate pair is never split.
  const chars = Array.from(text);
  return chars.length > SUMMARY_MAX_LENGTH ? `${chars.slice(0, SUMMARY_MAX_LENGTH - 3).join('')}...` : text;
}

export function alertmanagerLink(group: AlertGroup): string | undefined {
  if (!group.externalURL) return undefined;
  const base = group.externalURL.replace(/\/+$/, '');
  const filter = encodeURIComponent(`{${canonicalLabels(group.groupLabels)}}`);
  return `${base}/#/alerts?receiver=${encodeURIComponent(group.receiver)}&filter=${filter}`;
}

function isLink(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

function alertLine(alert: Alert, commonLabels: Record<string, string>): string {
  const distinct = Object.keys(alert.labels)
    .sort()
    .filter((key) => commonLabels[key] !== alert.labels[key])
    .map((key) => `${key}="${alert.labels[key]}"`)
    .join(', ');

  const links = Object.keys(alert.annotations)
    .sort()
    .filter((key) => isLink(alert.annotations[key]))
    .map((key) => `[${key}|${alert.annotations[key]}]`);
  if (alert.generatorURL) {
    links.push(`[source|${alert.generatorURL}]`);
  }

  return ['•', distinct, links.length > 0 ? `(${links.join(', ')})` : '']
    .filter(Boolean)
    .join(' ');
}

/**
 * Jira wiki markup describing the group: common information first, then one
 * line per alert.
 */
export function renderDescription(group: AlertGroup): string {
  const lines: string[] = ['h2. Common information'];

  if (group.groupKey) {
    lines.push(`{noformat:borderStyle=none|bgColor=#FFFFFF}Group key: ${group.groupKey}{noformat}`);
  }
  const link = alertmanagerLink(group);
  if (link) {
    lines.push(`[Alertmanager|${link}]`);
  }

  lines.push('', '_Common_Annotations_:');
  for (const key of Object.keys(group.commonAnnotations).sort()) {
    lines.push(`* *${key}*: ${group.commonAnnotations[key]}`);
  }

  lines.push('', '_Common_Labels_:');
  for (const key of Object.keys(group.commonLabels).sort()) {
    lines.push(`* ${key}: "${group.commonLabels[key]}"`);
  }

  const firing = group.alerts.filter((alert) => alert.status === 'firing');
  const resolved = group.alerts.filter((alert) => alert.status === 'resolved');

  lines.push('', `h2. Active alerts (total : ${firing.length})`);
  lines.push(...firing.map((alert) => alertLine(alert, group.commonLabels)));

  if (resolved.length > 0) {
    lines.push('', `h2. Resolved alerts (total : ${resolved.length})`);
    lines.push(...resolved.map((alert) => alertLine(alert, group.commonLabels)));
  }

  if (group.truncatedAlerts) {
    lines.push('', `_${group.truncatedAlerts} more alerts truncated by Alertmanager_`);
  }

  return lines.join('\n');
}

/**
 * Puts the rendered text under the boundary marker, keeping whatever a person
 * wrote above the marker in an existing description.
 */
export function composeDescription(rendered: string, existing?: string | null): string {
  let custom = '';
  if (existing) {
    const boundary = existing.lastIndexOf(DESCRIPTION_BOUNDARY);
    custom = (boundary === -1 ? existing : existing.slice(0, boundary)).trim();
  }
  const generated = `${DESCRIPTION_BOUNDARY}\n\n${rendered}`;
  return custom ? `${custom}\n\n${generated}` : generated;
}

// Jira labels cannot contain whitespace.
function toJiraLabel(value: string): string {
  return value.trim().replace(/\s+/g, '_');
}

export function issueLabels(commonLabels: Record<string, string>, fingerprintLabel: string): string[] {
  const labels = ['alert'];
  for (const [key, value] of Object.entries(commonLabels)) {
    if (TAG_ALLOW_LIST.includes(key)) {
      labels.push(toJiraLabel(`${key}:${value}`));
    }
    if (key === 'tags') {
      labels.push(
        ...value
          .split(',')
          .map(toJiraLabel)
          .filter((tag) => tag.length > 0),
      );
    }
  }
  labels.push(fingerprintLabel);
  return [...new Set(labels)];
}
