/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { TrackerClient, Transition } from '../jira/tracker.interface';

/** Resolves a transition name to the matching transition, if valid right now. */
export type TransitionCheck = (name: string) => Promise<Transition | undefined>;

export interface TransitionSelection {
  transition?: Transition;
  // Candidate names in the order they were checked.
  attempted: string[];
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * isTransitionValid for one issue. The tracker is asked for the issue's
 * transitions on the first check only; names match case-insensitively.
 */
export function transitionCheck(
  tracker: Pick<TrackerClient, 'listTransitions'>,
  issueKey: string,
): TransitionCheck {
  let available: Promise<Transition[]> | undefined;

  return async (name) => {
    if (!available) {
      available = tracker.listTransitions(issueKey);
    }
    const wanted = normalizeName(name);
    return (await available).find((transition) => normalizeName(transition.name) === wanted);
  };
}

/**
 * Walks the ranked candidates and stops at the first one the check accepts.
 * Candidates after it are never checked.
 */
export async function firstValidTransition(
  candidates: readonly string[],
  isTransitionValid: TransitionCheck,
): Promise<TransitionSelection> {
  const attempted: string[] = [];

  for (const candidate of candidates) {
    attempted.push(candidate);
    const transition = await isTransitionValid(candidate);
    if (transition) {
      return { transition, attempted };
    }
  }

  return { attempted };
}
