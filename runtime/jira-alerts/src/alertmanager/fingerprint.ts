/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { createHash } from 'crypto';

export const FINGERPRINT_LENGTH = 10;

// Canonical form of a label set: keys sorted, values JSON-quoted.
export function canonicalLabels(labels: Record<string, string>): string {
  return Object.keys(labels)
    .sort()
    .map((key) => `${key}=${JSON.stringify(labels[key])}`)
    .join(',');
}

/**
 * Stable identifier of an alert group, used to find its Jira issue again.
 * Only the group labels take part, so the fingerprint survives alerts
 * joining or leaving the group.
 */
export function fingerprint(groupLabels: Record<string, string>): string {
  return createHash('sha1')
    .update(canonicalLabels(groupLabels), 'utf8')
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}

export function fingerprintLabel(prefix: string, value: string): string {
  return `${prefix}:${value}`;
}
