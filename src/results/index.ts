export { ResultStore, type ReportListItem } from './store.js';
export {
  formatReport,
  formatReportList,
  formatCase,
  orderedCases,
  formatClassification,
  percent,
  type ViewOptions,
} from './format.js';
