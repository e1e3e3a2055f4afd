export * from './shared/traceParser';
export * from './shared/callTree';
export { renderReport, defaultReportOptions, INDENT_STEP } from './shared/report';
export type { ReportOptions } from './shared/report';
export { formatCallSite, formatPercent, formatSeconds, fitFilePath } from './shared/format';
export { loadForest, removeStore, saveForest } from './services/treeStore';
export { TraceStructureError, TreeStoreError, getErrorMessage } from './utils/error';
