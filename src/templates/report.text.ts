/**
 * Report Templates
 * Plain text and JSON renderings of a triage report
 */

import chalk from 'chalk';
import { Classification, Finding, Report, RiskLevel, RISK_LEVELS } from '../types';

export interface TextReportOptions {
  /** Colorize risk labels (ANSI escapes) */
  color?: boolean;
}

type Painter = (text: string) => string;

function riskPainter(palette: chalk.Chalk, risk: RiskLevel): Painter {
  switch (risk) {
    case 'High':
      return palette.red.bold;
    case 'Medium':
      return palette.yellow;
    case 'Low':
      return palette.green;
    case 'Unknown':
      return palette.gray;
  }
}

/**
 * `YYYY-MM-DD` in UTC, or `unknown`
 */
export function formatDiscoveryDate(date: Date | null): string {
  return date ? date.toISOString().slice(0, 10) : 'unknown';
}

/**
 * Leading line: target, record count and counts per risk level
 */
export function buildSummaryLine(report: Report): string {
  const counts = RISK_LEVELS.map(risk => `${risk}:${report.counts[risk]}`).join(' ');
  const noun = report.totalRecords === 1 ? 'record' : 'records';
  return `Target ${report.target.value} (${report.target.kind}): ${report.totalRecords} ${noun} | ${counts}`;
}

/**
 * `3 credentials (password, hash)`, or null when none were reported. Values are never shown.
 */
export function formatCredentials(classification: Classification): string | null {
  const { credentialCount, credentialKinds } = classification;
  if (credentialCount <= 0) return null;

  const noun = credentialCount === 1 ? 'credential' : 'credentials';
  const kinds = credentialKinds.length > 0 ? ` (${credentialKinds.join(', ')})` : '';
  return `${credentialCount} ${noun}${kinds}`;
}

/**
 * One line per finding: risk, source, summary, credentials when reported, discovery date
 */
export function buildFindingLine(finding: Finding, palette: chalk.Chalk = new chalk.Instance({ level: 0 })): string {
  const risk = finding.classification.risk;
  const label = riskPainter(palette, risk)(`[${risk}]`);
  const fields = [`${label} ${finding.record.source}`, finding.classification.summary];

  const credentials = formatCredentials(finding.classification);
  if (credentials) fields.push(credentials);

  fields.push(`discovered ${formatDiscoveryDate(finding.record.discoveredAt)}`);
  return fields.join(' | ');
}

/**
 * Build the human-readable report. Generation time is left out so that
 * identical inputs render identical text.
 */
export function buildPlainTextReport(report: Report, options: TextReportOptions = {}): string {
  const palette = new chalk.Instance({ level: options.color ? 1 : 0 });
  const lines = [palette.bold(buildSummaryLine(report))];

  for (const finding of report.findings) {
    lines.push(buildFindingLine(finding, palette));
  }

  if (report.timedOut) {
    lines.push(
      palette.yellow(
        `Note: run deadline reached; ${report.forcedUnknown} ${report.forcedUnknown === 1 ? 'record was' : 'records were'} not analyzed and reported as Unknown`
      )
    );
  }

  return lines.join('\n') + '\n';
}

/**
 * Machine-readable report with a fixed key order and ISO dates
 */
export function buildJsonReport(report: Report): string {
  return JSON.stringify(
    {
      target: {
        value: report.target.value,
        kind: report.target.kind,
      },
      session: {
        id: report.session.id,
        status: report.session.status,
        createdAt: report.session.createdAt.toISOString(),
      },
      totalRecords: report.totalRecords,
      counts: report.counts,
      timedOut: report.timedOut,
      forcedUnknown: report.forcedUnknown,
      generatedAt: report.generatedAt.toISOString(),
      findings: report.findings.map(finding => ({
        id: finding.record.id,
        source: finding.record.source,
        bucket: finding.record.bucket,
        visibility: finding.record.visibility,
        sizeBytes: finding.record.sizeBytes,
        discoveredAt: finding.record.discoveredAt ? finding.record.discoveredAt.toISOString() : null,
        risk: finding.classification.risk,
        summary: finding.classification.summary,
        tags: finding.classification.tags,
        credentialCount: finding.classification.credentialCount,
        credentialKinds: finding.classification.credentialKinds,
        preview: finding.preview,
      })),
    },
    null,
    2
  );
}
