/**
 * Shadow log reader — turns a shadow_log CSV file into TradeRecords.
 *
 * The file is read whole, then rows are validated one at a time
 * as the caller pulls them. Any bad header or row aborts the read with a
 * ParseError; there is no partial-record tolerance.
 */

import { readFile } from "node:fs/promises";
import csv from "csv-parser";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { formatIssues, validate, z } from "../lib/validation/index.js";
import type { TradeRecord } from "../report/types.js";
import { IOError, ParseError, classifyError } from "../shared/errors.js";
import { type Result, err, mapErr, ok, unwrap } from "../shared/result.js";

export const REQUIRED_COLUMNS = ["pnl_total", "q_set", "q_req", "bucket", "strategy"] as const;

// Plain decimal floats with optional exponent and digit-group underscores,
// plus inf, infinity and nan in any case. Hex, binary and octal literals are rejected.
const DECIMAL_FLOAT =
	/^[+-]?(?:(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:e[+-]?\d(?:_?\d)*)?|inf(?:inity)?|nan)$/i;

/** Converts text already matched by DECIMAL_FLOAT. */
export function toFloat(text: string): number {
	const compact = text.replaceAll("_", "");
	const negative = compact.startsWith("-");
	const body = compact.replace(/^[+-]/, "").toLowerCase();
	if (body === "nan") return Number.NaN;
	if (body.startsWith("inf")) return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
	return Number(compact);
}

const numericField = z
	.string()
	.trim()
	.regex(DECIMAL_FLOAT, "not a decimal number")
	.transform(toFloat);

const shadowRowSchema = z
	.object({
		pnl_total: numericField,
		q_set: numericField,
		q_req: numericField,
		bucket: z.string(),
		strategy: z.string(),
	})
	.transform(
		(row): TradeRecord => ({
			pnlTotal: row.pnl_total,
			qSet: row.q_set,
			qReq: row.q_req,
			bucket: row.bucket,
			strategy: row.strategy,
		}),
	);

/** Fails with the list of required columns the header does not name. */
export function checkHeader(headers: readonly string[]): Result<void, ParseError> {
	const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
	if (missing.length === 0) {
		return ok(undefined);
	}
	return err(
		new ParseError(
			`missing column${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`,
			{ missing, headers },
			`header must name ${REQUIRED_COLUMNS.join(", ")}`,
		),
	);
}

/**
 * Validates one raw CSV row (column name → cell) into a TradeRecord.
 * @param row - 1-based index of the data row, header excluded
 */
export function parseShadowRow(raw: unknown, row: number): Result<TradeRecord, ParseError> {
	return mapErr(
		validate(shadowRowSchema, raw),
		(error) =>
			new ParseError(`row ${row}: ${formatIssues(error.issues)}`, {
				row,
				issues: error.issues,
				cause: error,
			}),
	);
}

/**
 * Reads the shadow log at `path`, yielding one TradeRecord per data row.
 * A zero-byte file yields nothing, as does a header-only file, whatever columns
 * it names: the header is checked when the first data row arrives. Blank lines
 * are skipped and do not count as rows.
 *
 * @throws IOError when the file cannot be read
 * @throws ParseError on a header missing required columns or an invalid row
 */
export async function* readShadowLog(
	path: string,
	logger: Logger = silentLogger,
): AsyncGenerator<TradeRecord, void, undefined> {
	const content = await readWhole(path);

	const seen: { headers: readonly string[] | undefined } = { headers: undefined };
	const parser = csv();
	parser.once("headers", (names: string[]) => {
		seen.headers = names;
		logger.debug({ path, columns: names.length }, "Shadow log header read");
	});
	parser.end(content);

	let row = 0;
	for await (const raw of parser) {
		if (isBlankRow(raw)) continue;
		if (row === 0) {
			unwrap(checkHeader(seen.headers ?? []));
		}
		row += 1;
		yield unwrap(parseShadowRow(raw, row));
	}
}

/** A row with no cells, or only empty ones, such as a blank line. */
export function isBlankRow(raw: unknown): boolean {
	if (typeof raw !== "object" || raw === null) return false;
	return Object.values(raw).every((cell) => cell === undefined || cell === "");
}

async function readWhole(path: string): Promise<string> {
	try {
		return await readFile(path, "utf-8");
	} catch (error: unknown) {
		const classified = classifyError(error);
		if (classified instanceof IOError) {
			throw classified;
		}
		throw new IOError(`cannot read ${path}: ${classified.message}`, { path, cause: error });
	}
}
