import type { FinalResult, PopulationState } from '../types';

export function renderFinalMarkdown(result: FinalResult): string {
  const { best } = result;
  const lines = [
    `# Best Idea: ${best.title}`,
    '',
    `**Score:** ${best.overallScore.toFixed(2)}/10`,
    '',
    best.summary,
    '',
    '## Details',
    '',
    `**Audience:** ${best.facets.audience}`,
    `**Problem:** ${best.facets.jtbd}`,
    `**Unique:** ${best.facets.differentiator}`,
    `**Monetization:** ${best.facets.monetization}`,
    `**Distribution:** ${best.facets.distribution}`,
    `**Risks:** ${best.facets.risks}`,
    '',
    '## Why it won',
    '',
    ...best.whyWon.map(reason => `- ${reason}`)
  ];

  if (result.runnersUp.length > 0) {
    lines.push('', '## Runners Up', '');
    result.runnersUp.forEach((r, i) => lines.push(`${i + 1}. [${r.overallScore.toFixed(2)}] ${r.title}`));
  }

  return lines.join('\n');
}

/** Shown by `show` when the run has no final result yet. */
export function renderProgress(state: PopulationState): string {
  const active = state.ideas.filter(i => i.status === 'active').length;
  return [
    `Run ${state.runId} has not completed yet.`,
    `Current iteration: ${state.iteration}`,
    `Active ideas: ${active}`,
    `Best score: ${state.bestScore === null ? '-' : state.bestScore.toFixed(2)}`
  ].join('\n');
}
