import type { PipelinePlan, RunReport } from '../contracts/run.js'

/**
 * Formats a run report as JSON output.
 *
 * @param report Run report.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatRunReportAsJson = (report: RunReport, indentation = 2): string => {
  return JSON.stringify(report, null, indentation)
}

/**
 * Formats a dry-run plan as JSON output.
 *
 * @param plan Pipeline plan.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatPipelinePlanAsJson = (plan: PipelinePlan, indentation = 2): string => {
  return JSON.stringify(plan, null, indentation)
}
