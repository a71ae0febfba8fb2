const DAY_MS = 1000 * 60 * 60 * 24;

export function isValidDate(value: string): boolean {
    return !Number.isNaN(new Date(value).getTime());
}

/** Calendar comparison, usable as an `Array.prototype.sort` comparator. */
export function compareDates(a: string, b: string): number {
    return new Date(a).getTime() - new Date(b).getTime();
}

export function addWeeks(date: string, weeks: number): string {
    const shifted = new Date(new Date(date).getTime() + weeks * 7 * DAY_MS);
    return shifted.toISOString().split("T")[0];
}

export function formatDateDisplay(date: string): string {
    const parsed = new Date(date);
    if (Number.isNaN(parsed.getTime())) return date;
    return parsed.toLocaleDateString("en-US", {
        year: "numeric",
        month: "short",
        day: "numeric",
        timeZone: "UTC",
    });
}
