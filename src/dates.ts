/**
 * tally-connector — report date ranges
 *
 * Tally reports run over a period. When a caller gives no start date the
 * period begins on 1 April, the first day of the Indian financial year that
 * contains the end date. Dates are local calendar dates.
 */

export interface DateRange {
	readonly start: Date;
	readonly end: Date;
	/** Sent as `SVCURRENTDATE`; always the end of the period. */
	readonly current: Date;
}

/** Month index (0-based) on which the financial year starts. */
const FINANCIAL_YEAR_START_MONTH = 3;

function startOfDay(d: Date): Date {
	return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

/** 1 April of the financial year containing `d`. */
export function financialYearStart(d: Date): Date {
	const year = d.getMonth() >= FINANCIAL_YEAR_START_MONTH ? d.getFullYear() : d.getFullYear() - 1;
	return new Date(year, FINANCIAL_YEAR_START_MONTH, 1);
}

/**
 * Resolves a report period. `end` defaults to `today`, `start` to the
 * start of the financial year containing `end`.
 */
export function getDateRange(start?: Date | null, end?: Date | null, today: Date = new Date()): DateRange {
	const to = startOfDay(end ?? today);
	const from = start ? startOfDay(start) : financialYearStart(to);
	if (from.getTime() > to.getTime()) {
		throw new RangeError(`Report period starts (${formatTallyDate(from)}) after it ends (${formatTallyDate(to)})`);
	}
	return { start: from, end: to, current: to };
}

/** `dd-mm-yyyy`, the format Tally takes in `SVFROMDATE` and friends. */
export function formatTallyDate(d: Date): string {
	const dd = String(d.getDate()).padStart(2, '0');
	const mm = String(d.getMonth() + 1).padStart(2, '0');
	return `${dd}-${mm}-${d.getFullYear()}`;
}
