import type { EvaluationReport, FlaggedInstance, JudgeResult } from '../domain/types.js'

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0
}

/**
 * Deterministic aggregate of judge results. Scores are averaged over the
 * judges that reported them; every issue costs 0.05 and the worst severity
 * 0.03 per point, with the penalty capped at 0.5.
 */
export function codeAggregate(results: JudgeResult[]): EvaluationReport {
  const flaggedInstances: FlaggedInstance[] = []
  let highestSeverity = 0
  const completion: number[] = []
  const realistic: number[] = []

  for (const result of results) {
    for (const issue of result.issues) {
      highestSeverity = Math.max(highestSeverity, issue.severity)
      flaggedInstances.push({ ...issue, judgeModelId: result.judgeModelId })
    }
    if (result.completionScore !== null) completion.push(result.completionScore)
    if (result.realisticScore !== null) realistic.push(result.realisticScore)
  }

  const completionAvg = mean(completion)
  const realisticAvg = mean(realistic)
  const issuePenalty = Math.min(0.5, flaggedInstances.length * 0.05 + highestSeverity * 0.03)
  const base = (completionAvg / 100) * 0.5 + (realisticAvg / 100) * 0.5
  const overall = Math.max(0, Math.min(1, base - issuePenalty))

  return {
    summary:
      `Total issues: ${flaggedInstances.length}; highest severity: ${highestSeverity}; ` +
      `Completeness: ${completionAvg.toFixed(1)}; Realistic: ${realisticAvg.toFixed(1)}.`,
    overallScore: round(overall, 3),
    totalIssues: flaggedInstances.length,
    highestSeverity,
    completionScore: round(completionAvg, 1),
    realisticScore: round(realisticAvg, 1),
    flaggedInstances,
    source: 'code',
  }
}
