/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { z } from 'zod';

const LabelSet = z.record(z.string());

export const AlertStatusSchema = z.enum(['firing', 'resolved']);

export const AlertSchema = z.object({
  status: AlertStatusSchema,
  labels: LabelSet.default({}),
  annotations: LabelSet.default({}),
  startsAt: z.string().optional(),
  endsAt: z.string().optional(),
  generatorURL: z.string().optional(),
  fingerprint: z.string().optional(),
});

/**
 * Alertmanager generic webhook body (versions 3 and 4). Fields this service
 * does not read are accepted and dropped.
 */
export const AlertGroupSchema = z.object({
  version: z.enum(['3', '4']).optional(),
  groupKey: z.string().optional(),
  truncatedAlerts: z.number().optional(),
  status: AlertStatusSchema,
  receiver: z.string().default(''),
  groupLabels: LabelSet,
  commonLabels: LabelSet.default({}),
  commonAnnotations: LabelSet.default({}),
  externalURL: z.string().default(''),
  alerts: z.array(AlertSchema).default([]),
});

export type AlertStatus = z.infer<typeof AlertStatusSchema>;
export type Alert = z.infer<typeof AlertSchema>;
export type AlertGroup = z.infer<typeof AlertGroupSchema>;
export type AlertGroupPayload = z.input<typeof AlertGroupSchema>;
