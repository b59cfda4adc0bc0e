/**
 * Health Command
 *
 * Checks every collaborator that exposes a health endpoint.
 *
 * USAGE:
 *   provenance-engine health [--json]
 *
 * @module cli/commands/health
 */

import { describeError } from '../../core/errors.js';
import type { OrchestratorHealth } from '../../services/analysis-orchestrator.types.js';
import type { CommandContext } from '../lib/context.js';

export interface HealthResult {
  readonly success: boolean;
  readonly report?: OrchestratorHealth;
  readonly error?: string;
}

export async function runHealth(ctx: CommandContext): Promise<HealthResult> {
  ctx.logger.commandStart('health');
  try {
    const { orchestrator } = await ctx.engine();
    const report = await orchestrator.checkHealth();
    ctx.logger.output(report, () => formatReport(report));
    ctx.logger.commandEnd(report.healthy);
    return { success: report.healthy, report };
  } catch (error) {
    const message = describeError(error);
    ctx.logger.error(`Health check failed: ${message}`);
    ctx.logger.commandEnd(false);
    return { success: false, error: message };
  }
}

export function formatReport(report: OrchestratorHealth): string[] {
  const lines = [
    '='.repeat(60),
    `  Provenance Engine Health${' '.repeat(24)}${report.healthy ? '[HEALTHY]' : '[UNHEALTHY]'}`,
    '='.repeat(60),
    '',
  ];

  const entries = Object.entries(report.collaborators);
  if (entries.length === 0) {
    lines.push('  No collaborator exposes a health check');
  }
  for (const [name, status] of entries) {
    lines.push(`  ${status.healthy ? '[ok]' : '[FAIL]'} ${name}`);
    lines.push(`       ${status.message}`);
  }

  lines.push('', `  Running jobs: ${report.runningJobs}`, `  Queued jobs:  ${report.queuedJobs}`);
  return lines;
}
