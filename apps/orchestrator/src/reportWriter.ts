/**
 * Report Writer
 * Generates JSON and JUnit reports from run results
 */

import { writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { RunResult } from '@uipom/core';

export interface ReportPaths {
  json: string;
  junit: string;
}

export async function writeReport(results: RunResult[], outDir: string): Promise<ReportPaths> {
  // Ensure output directory exists
  if (!existsSync(outDir)) {
    mkdirSync(outDir, { recursive: true });
  }

  const paths: ReportPaths = { json: join(outDir, 'run.json'), junit: join(outDir, 'junit.xml') };
  writeFileSync(paths.json, JSON.stringify(results, null, 2), 'utf-8');
  writeFileSync(paths.junit, renderJUnit(results), 'utf-8');
  return paths;
}

function seconds(startedAt: string, finishedAt: string): string {
  return ((new Date(finishedAt).getTime() - new Date(startedAt).getTime()) / 1000).toFixed(3);
}

export function renderJUnit(results: RunResult[]): string {
  const totalTests = results.reduce((sum, r) => sum + r.summary.total, 0);
  const totalFailures = results.reduce((sum, r) => sum + r.summary.failed, 0);
  const totalTime = results
    .reduce((sum, r) => sum + Number(seconds(r.startedAt, r.finishedAt)), 0)
    .toFixed(3);

  const suites = results.map((result) => {
    const cases = result.steps.map((step) => {
      const open = `    <testcase name="${escapeXml(step.stepId)}" classname="${escapeXml(`${result.platform}.${result.scenario}`)}" time="${seconds(step.startedAt, step.finishedAt)}"`;
      if (step.ok) return `${open} />`;

      const kind = step.error?.kind ?? 'action-failed';
      const message = step.error?.message ?? 'Step failed';
      const evidence = step.evidence?.screenshotPath ?? step.evidence?.pageSourcePath;
      return [
        `${open}>`,
        `      <failure type="${escapeXml(kind)}" message="${escapeXml(message)}">${escapeXml(evidence ? `attachment: ${evidence}` : '')}</failure>`,
        '    </testcase>',
      ].join('\n');
    });

    return [
      `  <testsuite name="${escapeXml(`${result.scenario} [${result.platform}]`)}" tests="${result.summary.total}" failures="${result.summary.failed}" time="${seconds(result.startedAt, result.finishedAt)}">`,
      ...cases,
      '  </testsuite>',
    ].join('\n');
  });

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<testsuites name="uipom" tests="${totalTests}" failures="${totalFailures}" time="${totalTime}">`,
    ...suites,
    '</testsuites>',
    '',
  ].join('\n');
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
