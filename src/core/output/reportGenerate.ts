// src/core/output/reportGenerate.ts

import * as yaml from 'yaml';
import type { KubePruneOutputStyle } from '../../config/configSchema.js';
import type { CandidateDecision, PruneEvaluation } from '../pruner.js';

interface ReportDocument {
  namespace: string;
  kinds: string[];
  summary: PruneEvaluation['counts'];
  resources: CandidateDecision[];
}

const toReportDocument = (evaluation: PruneEvaluation): ReportDocument => ({
  namespace: evaluation.namespace,
  kinds: evaluation.kinds,
  summary: evaluation.counts,
  resources: evaluation.decisions,
});

const verdictLabel: Record<CandidateDecision['verdict'], string> = {
  prune: 'PRUNE',
  keep: 'KEEP',
  skipped: 'SKIP',
  error: 'ERROR',
};

const generateTextReport = (evaluation: PruneEvaluation): string => {
  const lines = [`Namespace: ${evaluation.namespace}`];
  if (evaluation.decisions.length === 0) {
    lines.push('No candidate resources found.');
  }
  for (const decision of evaluation.decisions) {
    const line = `${verdictLabel[decision.verdict].padEnd(6)}${decision.kind}/${decision.name}`;
    lines.push(decision.error ? `${line} (${decision.error})` : line);
  }
  return `${lines.join('\n')}\n`;
};

/**
 * Renders a prune evaluation in the requested style.
 */
export const generateReport = (evaluation: PruneEvaluation, style: KubePruneOutputStyle): string => {
  switch (style) {
    case 'json':
      return `${JSON.stringify(toReportDocument(evaluation), null, 2)}\n`;
    case 'yaml':
      return yaml.stringify(toReportDocument(evaluation));
    case 'text':
      return generateTextReport(evaluation);
  }
};
