/**
 * Main exports for @yieldwatch/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, requireNotifyUrl } from './config/index.js';
export type { Config, ConfigOverrides } from './config/index.js';

// Universe
export { TwseListingSource, parseListingHtml } from './universe/twse-listing-source.js';
export type { UniverseSource } from './universe/types.js';

// Report hand-off
export { formatReport, formatRow, rankResults } from './report/report-format.js';
export { parseReport, parseReportLine } from './report/report-parser.js';
export { ReportFile } from './report/report-file.js';
export type { ReportSink, ReportSource } from './report/report-file.js';

// Jobs
export { MonthlyScanner } from './scanner/monthly-scanner.js';
export type { ScanRunSummary, ScanSettings } from './scanner/monthly-scanner.js';
export { PriceMonitor } from './monitor/price-monitor.js';
export type { MonitorRunInput, MonitorRunSummary } from './monitor/price-monitor.js';
export { HttpNotifier } from './notify/http-notifier.js';
export type { Notifier, NotifyReceipt } from './notify/http-notifier.js';

// Command exports
export { ScanCommand } from './commands/scan.command.js';
export { MonitorCommand } from './commands/monitor.command.js';
export type { Command, CommandOptions, CommandResult } from './commands/types.js';

export { runScan, runMonitor } from './start.js';
export { buildProgram } from './program.js';
