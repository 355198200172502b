/**
 * Report configuration.
 *
 * Defaults reproduce the promotion gate exactly; environment overrides exist
 * for replaying old runs against a stricter or looser gate.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface ReportConfig {
	/** Minimum global q_set/q_req ratio for GO (inclusive) */
	readonly minSetRatio: number;
	/** Total shadow PnL must be strictly above this for GO */
	readonly pnlThreshold: number;
	/** Fraction used for the worst-tail PnL line; fixed because the output label names it */
	readonly tailFraction: number;
	readonly logLevel: LogLevel;
}

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
	minSetRatio: 0.85,
	pnlThreshold: 0.0,
	tailFraction: 0.01,
	logLevel: "warn",
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Mutable builder shape for constructing Partial<ReportConfig>. */
interface MutableReportConfig {
	minSetRatio?: number;
	pnlThreshold?: number;
	logLevel?: LogLevel;
}

/**
 * Reads config overrides from the environment.
 * Supported: SHADOW_REPORT_MIN_SET_RATIO, SHADOW_REPORT_PNL_THRESHOLD, SHADOW_REPORT_LOG_LEVEL.
 * @throws ConfigError if a variable is set to an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ReportConfig> {
	const result: MutableReportConfig = {};

	const minSetRatio = parseFiniteEnv(env, "SHADOW_REPORT_MIN_SET_RATIO");
	if (minSetRatio !== undefined) {
		if (minSetRatio < 0) {
			throw new ConfigError(
				`Invalid SHADOW_REPORT_MIN_SET_RATIO: "${minSetRatio}" must be non-negative`,
			);
		}
		result.minSetRatio = minSetRatio;
	}

	const pnlThreshold = parseFiniteEnv(env, "SHADOW_REPORT_PNL_THRESHOLD");
	if (pnlThreshold !== undefined) {
		result.pnlThreshold = pnlThreshold;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const rawLevel = env["SHADOW_REPORT_LOG_LEVEL"];
	if (rawLevel) {
		const level = LOG_LEVELS.find((l) => l === rawLevel.trim().toLowerCase());
		if (level === undefined) {
			throw new ConfigError(
				`Invalid SHADOW_REPORT_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = level;
	}

	return result;
}

/** Defaults merged with environment overrides. */
export function loadReportConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
	return { ...DEFAULT_REPORT_CONFIG, ...configFromEnv(env) };
}

function parseFiniteEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const trimmed = raw.trim();
	const parsed = trimmed.length > 0 ? Number(trimmed) : Number.NaN;
	if (!Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a finite number`);
	}
	return parsed;
}
