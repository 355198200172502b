export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	unwrap,
	isOk,
	isErr,
} from "./result.js";

export {
	ExitCode,
	ReportError,
	UsageError,
	IOError,
	ParseError,
	ConfigError,
	classifyError,
	isUsageError,
	isIOError,
	isParseError,
	isConfigError,
} from "./errors.js";

export {
	type ReportConfig,
	DEFAULT_REPORT_CONFIG,
	configFromEnv,
	loadReportConfig,
} from "./config.js";
