/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { parseArgs } from 'node:util';
import { EnvOverrides } from './env';

export const USAGE =
  'usage: jira-alerts [--port N] [--log-level LEVEL] [--timeout MS] ' +
  '[--resolve-transitions A,B] [--reopen-transitions A,B] [--resolved-status A,B] ' +
  '[--update-existing] <jira-url>';

/**
 * Turns command-line flags into environment overrides. Flags win over the
 * environment; anything not given on the command line is left out.
 */
export function parseCommandLine(argv: string[]): EnvOverrides {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      port: { type: 'string' },
      'log-level': { type: 'string' },
      timeout: { type: 'string' },
      'resolve-transitions': { type: 'string' },
      'reopen-transitions': { type: 'string' },
      'resolved-status': { type: 'string' },
      'update-existing': { type: 'boolean' },
    },
  });

  if (positionals.length > 1) {
    throw new Error(`expected a single <jira-url> argument\n${USAGE}`);
  }

  const overrides: EnvOverrides = {};
  if (positionals.length === 1) overrides.JIRA_URL = positionals[0];
  if (values.port !== undefined) overrides.PORT = values.port;
  if (values['log-level'] !== undefined) overrides.LOG_LEVEL = values['log-level'];
  if (values.timeout !== undefined) overrides.JIRA_TIMEOUT_MS = values.timeout;
  if (values['resolve-transitions'] !== undefined) {
    overrides.RESOLVE_TRANSITIONS = values['resolve-transitions'];
  }
  if (values['reopen-transitions'] !== undefined) {
    overrides.REOPEN_TRANSITIONS = values['reopen-transitions'];
  }
  if (values['resolved-status'] !== undefined) {
    overrides.RESOLVED_STATUS = values['resolved-status'];
  }
  if (values['update-existing']) overrides.UPDATE_EXISTING_ISSUES = 'true';

  return overrides;
}
