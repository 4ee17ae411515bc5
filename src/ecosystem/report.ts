import { promises as fs } from 'fs';
import path from 'path';
import { createLogger } from '../logger.js';
import {
  PASSING_STATUSES,
  type EcosystemReport,
  type ValidationResult
} from '../types.js';

const logger = createLogger('report');

function countBy(values: string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

export function recommendations(results: ValidationResult[]): string[] {
  const advice: string[] = [];

  const failed = results.filter(
    (result) => !PASSING_STATUSES.includes(result.status)
  ).length;
  if (failed > 0) {
    advice.push(
      `${failed} implementations failed validation. Consider improving framework compatibility.`
    );
  }

  const setupFailures = results.filter((r) => r.status === 'setup_failed').length;
  if (setupFailures > 0) {
    advice.push(
      `${setupFailures} implementations had setup issues. This may indicate missing dependencies or unclear setup instructions.`
    );
  }

  const startFailures = results.filter((r) => r.status === 'failed_to_start').length;
  if (startFailures > 0) {
    advice.push(
      `${startFailures} servers failed to start. Consider standardizing server startup mechanisms.`
    );
  }

  const versions = new Set(
    results.flatMap((r) => (r.protocol_version ? [r.protocol_version] : []))
  );
  if (versions.size > 1) {
    advice.push(
      'Multiple protocol versions detected. Ensure backward compatibility across versions.'
    );
  }

  if (advice.length === 0) {
    advice.push('All validations passed successfully!');
  }
  return advice;
}

export function generateReport(
  results: ValidationResult[],
  now: Date = new Date()
): EcosystemReport {
  const total = results.length;
  const successful = results.filter((result) =>
    PASSING_STATUSES.includes(result.status)
  ).length;

  const scores = results.flatMap((result) =>
    result.compliance_score === null ? [] : [result.compliance_score]
  );
  const average =
    scores.length > 0
      ? scores.reduce((sum, score) => sum + score, 0) / scores.length
      : null;

  return {
    timestamp: now.toISOString(),
    summary: {
      total_validations: total,
      successful_validations: successful,
      success_rate: total > 0 ? (successful * 100) / total : 0,
      average_compliance_score: average
    },
    status_distribution: countBy(results.map((result) => result.status)),
    protocol_version_distribution: countBy(
      results.flatMap((result) =>
        result.protocol_version ? [result.protocol_version] : []
      )
    ),
    detailed_results: results,
    recommendations: recommendations(results)
  };
}

export async function writeReport(
  report: EcosystemReport,
  outputPath: string
): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  logger.info(`Report saved to ${outputPath}`);
}

/** Console summary printed after a batch. */
export function formatSummary(report: EcosystemReport): string {
  const { summary } = report;
  const rule = '='.repeat(50);
  const lines = [
    rule,
    'MCP ECOSYSTEM VALIDATION SUMMARY',
    rule,
    `Total validations: ${summary.total_validations}`,
    `Successful: ${summary.successful_validations}`,
    `Success rate: ${summary.success_rate.toFixed(1)}%`
  ];
  if (summary.average_compliance_score !== null) {
    lines.push(
      `Average compliance: ${summary.average_compliance_score.toFixed(1)}%`
    );
  }
  lines.push('', 'Recommendations:');
  for (const recommendation of report.recommendations) {
    lines.push(`  ${recommendation}`);
  }
  return lines.join('\n');
}
