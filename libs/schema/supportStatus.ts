import { compareReleases, isRelease } from './versions.js';

/**
 * Lifecycle states of a profile type version, in the order a version
 * normally moves through them. The order gives each status its index; the
 * data model does not force a version to stay UNSUPPORTED once it gets there.
 */
export const SUPPORT_STATUSES = ['SUPPORTED', 'DEPRECATED', 'UNSUPPORTED'] as const;

export type SupportStatus = (typeof SUPPORT_STATUSES)[number];

export interface SupportStatusEntry {
    readonly status: SupportStatus;
    /** Release from which this status applies */
    readonly since: string;
}

export function supportStatusIndex(status: SupportStatus): number {
    return SUPPORT_STATUSES.indexOf(status);
}

export function isSupportStatus(value: string): value is SupportStatus {
    return (SUPPORT_STATUSES as readonly string[]).includes(value);
}

/**
 * Returns every problem with a version's status ledger: it must be non-empty,
 * use known statuses and well-formed releases, and list releases in strictly
 * increasing order.
 */
export function checkSupportLedger(entries: readonly SupportStatusEntry[], location: string): string[] {
    const problems: string[] = [];

    if (entries.length === 0) {
        problems.push(`${location}: support status ledger is empty`);
        return problems;
    }

    let previous: string | null = null;
    entries.forEach((entry, index) => {
        const at = `${location}[${index}]`;
        if (!isSupportStatus(entry.status)) {
            problems.push(`${at}: unknown status '${entry.status}'`);
        }
        if (!isRelease(entry.since)) {
            problems.push(`${at}: malformed release '${entry.since}'`);
            return;
        }
        if (previous !== null && compareReleases(entry.since, previous) <= 0) {
            problems.push(`${at}: release ${entry.since} does not follow ${previous}`);
        }
        previous = entry.since;
    });

    return problems;
}
