import type { ExceptionFinding, Severity, ShipmentSnapshot } from '../core/types.js';
import { RuleEvaluationError } from '../core/errors.js';
import { RULES, type RuleContext, type RuleEvaluator } from '../rules/evaluators.js';
import { getComponentLogger } from '../utils/logging.js';

const SEVERITY_RANK: Record<Severity, number> = { high: 3, medium: 2, low: 1 };

export function severityRank(s: Severity): number {
  return SEVERITY_RANK[s];
}

export interface AggregationResult {
  findings: ExceptionFinding[];
  ruleErrors: RuleEvaluationError[];
}

function findingKey(f: ExceptionFinding): string {
  return `${f.shipmentId}\u0000${f.type}`;
}

/**
 * Keeps one finding per (shipmentId, type). Higher severity wins; on a tie the
 * finding seen first (earlier evaluator) is kept.
 */
export function dedupeFindings(findings: readonly ExceptionFinding[]): ExceptionFinding[] {
  const kept = new Map<string, ExceptionFinding>();
  for (const f of findings) {
    const key = findingKey(f);
    const existing = kept.get(key);
    if (!existing || severityRank(f.severity) > severityRank(existing.severity)) {
      kept.set(key, f);
    }
  }
  return [...kept.values()];
}

// Highest severity first, then shipmentId ascending; Array.prototype.sort is stable
export function sortFindings(findings: readonly ExceptionFinding[]): ExceptionFinding[] {
  return [...findings].sort((a, b) => {
    const sr = severityRank(b.severity) - severityRank(a.severity);
    if (sr !== 0) return sr;
    if (a.shipmentId < b.shipmentId) return -1;
    if (a.shipmentId > b.shipmentId) return 1;
    return 0;
  });
}

export class ExceptionAggregator {
  constructor(private readonly rules: readonly RuleEvaluator[] = RULES) {}

  aggregate(snapshots: readonly ShipmentSnapshot[], ctx: RuleContext): AggregationResult {
    const raw: ExceptionFinding[] = [];
    const ruleErrors: RuleEvaluationError[] = [];
    for (const snapshot of snapshots) {
      for (const rule of this.rules) {
        try {
          const finding = rule.evaluate(snapshot, ctx);
          if (finding) raw.push(finding);
        } catch (err) {
          const wrapped = new RuleEvaluationError(snapshot.shipmentId, rule.name, err);
          ruleErrors.push(wrapped);
          getComponentLogger('aggregator').error(
            { err, shipmentId: snapshot.shipmentId, rule: rule.name },
            'rule-evaluation-failed',
          );
        }
      }
    }
    return { findings: sortFindings(dedupeFindings(raw)), ruleErrors };
  }
}
