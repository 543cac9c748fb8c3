/**
 * Report command construction.
 *
 * Clause order is fixed: object path and style first, then (for reports
 * written to a file) the destination, then each optional clause in the order
 * access object, time period, time step, additional data, summary, all lines.
 * Style, additional data and file path values are quoted.
 *
 * @module
 */

/**
 * Parameters shared by every report command.
 */
export interface ReportParams {
  /** Object path without the leading `*\/`, e.g. `Satellite/Sat1` */
  readonly objectPath: string
  /** Built-in style name or path to a custom style file */
  readonly style: string
  /** Second object for access-style reports */
  readonly accessObjectPath?: string
  /** `{interval} | UseAccessTimes | Intervals ...` */
  readonly timePeriod?: string
  /** `<value> | Bound <value> | Array "<timeArray>"` */
  readonly timeStep?: string | number
  /** Pre-data some styles require */
  readonly additionalData?: string
  readonly summary?: string
  readonly allLines?: string
}

/**
 * How a file report is written.
 */
export type ReportFileType = 'Export' | 'Save'

/**
 * Parameters of a report written to a file.
 */
export interface ReportFileParams extends ReportParams {
  /** Destination path on the remote's filesystem */
  readonly filePath: string
  /** Defaults to `Export` */
  readonly type?: ReportFileType
}

function optionalClauses(params: ReportParams): string {
  let clauses = ''
  if (params.accessObjectPath !== undefined) clauses += ` AccessObject ${params.accessObjectPath}`
  if (params.timePeriod !== undefined) clauses += ` TimePeriod ${params.timePeriod}`
  if (params.timeStep !== undefined) clauses += ` TimeStep ${params.timeStep}`
  if (params.additionalData !== undefined) clauses += ` AdditionalData "${params.additionalData}"`
  if (params.summary !== undefined) clauses += ` Summary ${params.summary}`
  if (params.allLines !== undefined) clauses += ` AllLines ${params.allLines}`
  return clauses
}

/**
 * Build a `ReportCreate` command that writes the report to a file.
 */
export function buildReportCreateCommand(params: ReportFileParams): string {
  return (
    `ReportCreate */${params.objectPath} Style "${params.style}"` +
    ` Type ${params.type ?? 'Export'} File "${params.filePath}"` +
    optionalClauses(params)
  )
}

/**
 * Build a `Report_RM` command that returns the report over the socket.
 */
export function buildReportReturningCommand(params: ReportParams): string {
  return `Report_RM */${params.objectPath} Style "${params.style}"` + optionalClauses(params)
}
