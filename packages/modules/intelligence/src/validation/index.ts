export { validateBoard, readRawRecord } from './record-validator';
export {
  buildQualityReport,
  mergeQualityReports,
  computeConfidence,
  countIssues,
  renderWarning,
  RECORD_FIELD,
} from './quality-report';
