/**
 * Wire module: Connect framing and command construction.
 *
 * @module
 */

export {
  ASYNC_HEADER_SIZE,
  ASYNC_SYNC_MARKER,
  ASYNC_TYPE_WIDTH,
  type AsyncHeader,
  type AsyncHeaderFields,
  type AsyncMessage,
  buildCommand,
  COMMAND_TERMINATOR,
  encodeAsyncHeader,
  encodeSyncHeader,
  NACK_CODE_SIZE,
  parseAsyncHeader,
  parseSimpleAck,
  parseSyncHeader,
  REPORT_RM_MARKER,
  REPORT_ROW_PREFIX_SIZE,
  SIMPLE_ACK_SIZE,
  type SimpleAckToken,
  splitCommands,
  splitReportBuffer,
  SYNC_HEADER_SIZE,
  type SyncHeader,
  type SyncMessage
} from './frame.js'
export {
  buildReportCreateCommand,
  buildReportReturningCommand,
  type ReportFileParams,
  type ReportFileType,
  type ReportParams
} from './report-command.js'
