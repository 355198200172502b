// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	ExitCode,
	ReportError,
	UsageError,
	IOError,
	ParseError,
	ConfigError,
	classifyError,
	type ReportConfig,
	DEFAULT_REPORT_CONFIG,
	configFromEnv,
	loadReportConfig,
} from "./shared/index.js";

// ── Report Core ──────────────────────────────────────────────────────
export {
	type TradeRecord,
	type GroupStats,
	type Summary,
	type Verdict,
	type DecisionThresholds,
	type ShadowReport,
	Decision,
	ShadowAggregator,
	emptySummary,
	aggregate,
	aggregateStream,
	percentile,
	decide,
	setRatio,
	groupSetRatio,
	avgPnl,
	averagePnlByGroup,
	formatReport,
	formatFixed,
	buildReport,
} from "./report/index.js";

// ── I/O ──────────────────────────────────────────────────────────────
export {
	REQUIRED_COLUMNS,
	checkHeader,
	parseShadowRow,
	readShadowLog,
} from "./io/shadow-log-reader.js";

// ── CLI ──────────────────────────────────────────────────────────────
export { USAGE, type CliIo, parseCliArgs, generateShadowReport, runCli } from "./cli/shadow-report.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { ValidationError, validate, formatIssues } from "./lib/validation/index.js";
