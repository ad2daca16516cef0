import dayjs from "dayjs";

export type DateInput = string | Date;

export function isValidMonth(month: string): boolean {
  return /^\d{4}-(0[1-9]|1[0-2])$/.test(month) && dayjs(`${month}-01`).isValid();
}

/** `count` consecutive months ending at the month of `reference`, oldest first. */
export function trailingMonths(count: number, reference: DateInput = new Date()): string[] {
  const end = dayjs(reference).startOf("month");
  if (!end.isValid()) {
    throw new Error(`Invalid reference date: ${String(reference)}`);
  }
  const months: string[] = [];
  for (let offset = count - 1; offset >= 0; offset--) {
    months.push(end.subtract(offset, "month").format("YYYY-MM"));
  }
  return months;
}

export function now(): string {
  return dayjs().toISOString();
}
