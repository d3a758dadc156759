/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import {
  DESCRIPTION_BOUNDARY,
  alertmanagerLink,
  composeDescription,
  issueLabels,
  renderDescription,
  renderSummary,
} from '../src/alertmanager/templates';
import { alertGroup, firingPayload } from './utils/fixtures';

describe('renderSummary', () => {
  it('should combine alertname and summary annotation', () => {
    expect(renderSummary(alertGroup())).toBe('Foo_Bar: Alert summary');
  });

  it('should fall back to the alertname alone', () => {
    const group = alertGroup({ ...firingPayload(), commonAnnotations: {} });
    expect(renderSummary(group)).toBe('Foo_Bar');
  });

  it('should fall back to the group labels', () => {
    const group = alertGroup({
      status: 'firing',
      groupLabels: { job: 'node', cluster: 'eu-1' },
    });
    expect(renderSummary(group)).toBe('Alert group {cluster="eu-1",job="node"}');
  });

  it('should cut summaries to what Jira accepts', () => {
    const group = alertGroup({
      ...firingPayload(),
      commonAnnotations: { summary: 'x'.repeat(300) },
    });
    const summary = renderSummary(group);

    expect(summary).toHaveLength(255);
    expect(summary.endsWith('...')).toBe(true);
  });

  it('should not split a character made of two code units', () => {
    const group = alertGroup({
      ...firingPayload(),
      commonAnnotations: { summary: `${'x'.repeat(242)}${'\u{1F600}'.repeat(10)}` },
    });

    expect(renderSummary(group)).toBe(`Foo_Bar: ${'x'.repeat(242)}\u{1F600}...`);
  });
});

describe('alertmanagerLink', () => {
  it('should filter the Alertmanager UI on the group labels', () => {
    expect(alertmanagerLink(alertGroup())).toBe(
      'https://alertmanager.example.com/#/alerts?receiver=jiralert' +
        '&filter=%7Balertname%3D%22Foo_Bar%22%2Cinstance%3D%22foo%22%7D',
    );
  });

  it('should be absent without an external URL', () => {
    expect(alertmanagerLink(alertGroup({ ...firingPayload(), externalURL: '' }))).toBeUndefined();
  });
});

describe('renderDescription', () => {
  it('should render the common information and the alert links', () => {
    expect(renderDescription(alertGroup())).toBe(
      [
        'h2. Common information',
        '{noformat:borderStyle=none|bgColor=#FFFFFF}Group key: {}/{}:{alertname="Foo_Bar", instance="foo"}{noformat}',
        '[Alertmanager|https://alertmanager.example.com/#/alerts?receiver=jiralert' +
          '&filter=%7Balertname%3D%22Foo_Bar%22%2Cinstance%3D%22foo%22%7D]',
        '',
        '_Common_Annotations_:',
        '* *link*: https://example.com/Foo+Bar',
        '* *summary*: Alert summary',
        '',
        '_Common_Labels_:',
        '* alertname: "Foo_Bar"',
        '* instance: "foo"',
        '',
        'h2. Active alerts (total : 1)',
        '• ([link|https://example.com/Foo+Bar], [source|https://example.com])',
      ].join('\n'),
    );
  });

  it('should list resolved alerts separately with their distinguishing labels', () => {
    const group = alertGroup({
      status: 'firing',
      groupLabels: { alertname: 'Foo_Bar' },
      commonLabels: { alertname: 'Foo_Bar' },
      alerts: [
        {
          status: 'firing',
          labels: { alertname: 'Foo_Bar', instance: 'foo' },
          annotations: { documentation: 'https://example.com/Foo', summary: 'Alert summary' },
          generatorURL: 'https://example.com/foo',
        },
        {
          status: 'resolved',
          labels: { alertname: 'Foo_Bar', instance: 'bar' },
        },
      ],
    });

    expect(renderDescription(group)).toBe(
      [
        'h2. Common information',
        '',
        '_Common_Annotations_:',
        '',
        '_Common_Labels_:',
        '* alertname: "Foo_Bar"',
        '',
        'h2. Active alerts (total : 1)',
        '• instance="foo" ([documentation|https://example.com/Foo], [source|https://example.com/foo])',
        '',
        'h2. Resolved alerts (total : 1)',
        '• instance="bar"',
      ].join('\n'),
    );
  });

  it('should say how many alerts Alertmanager left out', () => {
    const group = alertGroup({ ...firingPayload(), groupKey: undefined, externalURL: '', truncatedAlerts: 12 });

    expect(renderDescription(group).split('\n').slice(-3)).toEqual([
      '• ([link|https://example.com/Foo+Bar], [source|https://example.com])',
      '',
      '_12 more alerts truncated by Alertmanager_',
    ]);
  });
});

describe('composeDescription', () => {
  it('should start a new description with the boundary marker', () => {
    expect(composeDescription('body')).toBe(`${DESCRIPTION_BOUNDARY}\n\nbody`);
  });

  it('should keep what was written above the marker', () => {
    const existing = `Runbook notes\n\n${DESCRIPTION_BOUNDARY}\n\nold body`;
    expect(composeDescription('new body', existing)).toBe(
      `Runbook notes\n\n${DESCRIPTION_BOUNDARY}\n\nnew body`,
    );
  });

  it('should keep a description that has no marker yet', () => {
    expect(composeDescription('new body', 'hand written')).toBe(
      `hand written\n\n${DESCRIPTION_BOUNDARY}\n\nnew body`,
    );
  });
});

describe('issueLabels', () => {
  it('should keep allow-listed labels, expand tags and end with the fingerprint label', () => {
    const labels = issueLabels(
      { alertname: 'Foo', severity: 'critical', team: 'sre ops', tags: 'db, storage,,' },
      'jiralert:abc',
    );

    expect(labels).toEqual(['alert', 'severity:critical', 'team:sre_ops', 'db', 'storage', 'jiralert:abc']);
  });

  it('should drop duplicates', () => {
    expect(issueLabels({ tags: 'alert,db,db' }, 'jiralert:abc')).toEqual(['alert', 'db', 'jiralert:abc']);
  });
});
