/**
 * ReportError hierarchy — structured error classification.
 *
 * Every error carries a stable code and an exit status so the CLI boundary
 * can map failures to process exit codes without inspecting messages.
 */

/** Process exit statuses used by the report CLI. */
export const ExitCode = {
	Ok: 0,
	Failure: 1,
	Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Options for constructing ReportError subclasses with optional cause chain. */
interface ReportErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all report operations. */
export class ReportError extends Error {
	readonly code: string;
	readonly exitCode: ExitCode;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		exitCode: ExitCode,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "ReportError";
		this.code = code;
		this.exitCode = exitCode;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			exitCode: this.exitCode,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Wrong command-line shape; the only error the CLI reports with a usage line. */
export class UsageError extends ReportError {
	constructor(message: string, context: Record<string, unknown> & ReportErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "USAGE_ERROR", ExitCode.Usage, rest);
		this.name = "UsageError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Input file missing or unreadable. */
export class IOError extends ReportError {
	constructor(message: string, context: Record<string, unknown> & ReportErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "IO_ERROR", ExitCode.Failure, rest);
		this.name = "IOError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Header or record that cannot be turned into a trade record. */
export class ParseError extends ReportError {
	constructor(
		message: string,
		context: Record<string, unknown> & ReportErrorOptions = {},
		hint?: string,
	) {
		const { cause, ...rest } = context;
		super(message, "PARSE_ERROR", ExitCode.Failure, rest, hint);
		this.name = "ParseError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Invalid configuration value read from the environment. */
export class ConfigError extends ReportError {
	constructor(message: string, context: Record<string, unknown> & ReportErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ExitCode.Failure, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

const IO_ERRNO_CODES: ReadonlySet<string> = new Set([
	"ENOENT",
	"EACCES",
	"EPERM",
	"EISDIR",
	"ENOTDIR",
	"EMFILE",
	"EIO",
]);

function isErrnoException(error: Error): error is NodeJS.ErrnoException {
	return "code" in error && typeof error.code === "string";
}

/** Classify an unknown thrown value into a ReportError. Filesystem errno failures become IOError. */
export function classifyError(error: unknown): ReportError {
	if (error instanceof ReportError) return error;
	if (error instanceof Error) {
		if (isErrnoException(error) && error.code !== undefined && IO_ERRNO_CODES.has(error.code)) {
			return new IOError(error.message, {
				cause: error,
				errno: error.code,
				...(error.path !== undefined && { path: error.path }),
			});
		}
		const wrapped = new ReportError(error.message, "INTERNAL_ERROR", ExitCode.Failure);
		wrapped.cause = error;
		return wrapped;
	}
	return new ReportError(String(error), "INTERNAL_ERROR", ExitCode.Failure);
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for UsageError. */
export function isUsageError(e: unknown): e is UsageError {
	return e instanceof UsageError;
}

/** Type guard for IOError. */
export function isIOError(e: unknown): e is IOError {
	return e instanceof IOError;
}

/** Type guard for ParseError. */
export function isParseError(e: unknown): e is ParseError {
	return e instanceof ParseError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
