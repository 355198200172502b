/**
 * shadow-report CLI — one positional argument, the shadow log path.
 *
 * The report reaches stdout only after the whole file has been aggregated;
 * any failure leaves stdout empty. Diagnostics are pino JSON lines on stderr.
 */

import { readShadowLog } from "../io/shadow-log-reader.js";
import { type Logger, createLogger, silentLogger } from "../lib/logger/index.js";
import { aggregateStream } from "../report/aggregator.js";
import { averagePnlByGroup } from "../report/group-stats.js";
import { type ShadowReport, buildReport } from "../report/report.js";
import { DEFAULT_REPORT_CONFIG, type ReportConfig, loadReportConfig } from "../shared/config.js";
import { ExitCode, UsageError, classifyError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

export const USAGE = "usage: shadow-report <shadow_log.csv>";

interface TextSink {
	write(chunk: string): unknown;
}

export interface CliIo {
	readonly stdout: TextSink;
	readonly stderr: TextSink;
	readonly env: NodeJS.ProcessEnv;
}

/** Expects exactly one positional argument: the input path. */
export function parseCliArgs(argv: readonly string[]): Result<string, UsageError> {
	const [path] = argv;
	if (argv.length !== 1 || path === undefined) {
		return err(new UsageError(`expected 1 argument, got ${argv.length}`, { argv: [...argv] }));
	}
	return ok(path);
}

/** Reads, aggregates and renders the shadow log at `path`. */
export async function generateShadowReport(
	path: string,
	config: ReportConfig = DEFAULT_REPORT_CONFIG,
	logger: Logger = silentLogger,
): Promise<ShadowReport> {
	const summary = await aggregateStream(readShadowLog(path, logger));
	const report = buildReport(summary, config);
	logger.info(
		{
			path,
			rows: summary.rowCount,
			decision: report.verdict.decision,
			reasons: report.verdict.reasons,
			avgPnlByBucket: averagePnlByGroup(summary.byBucket),
			avgPnlByStrategy: averagePnlByGroup(summary.byStrategy),
		},
		"Shadow log aggregated",
	);
	return report;
}

export async function runCli(argv: readonly string[], io: CliIo): Promise<ExitCode> {
	const args = parseCliArgs(argv);
	if (!args.ok) {
		io.stderr.write(`${USAGE}\n`);
		return args.error.exitCode;
	}

	let logger = createLogger({ level: "error", destination: io.stderr });
	try {
		const config = loadReportConfig(io.env);
		logger = createLogger({ level: config.logLevel, destination: io.stderr }).child({
			component: "shadow-report",
		});
		const report = await generateShadowReport(args.value, config, logger);
		io.stdout.write(report.lines.map((line) => `${line}\n`).join(""));
		return ExitCode.Ok;
	} catch (error: unknown) {
		const classified = classifyError(error);
		logger.error({ err: classified }, classified.message);
		return classified.exitCode;
	}
}
