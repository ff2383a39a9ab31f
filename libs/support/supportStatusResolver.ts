/**
 * Support Status Resolver
 *
 * Computes the support status of a profile type version at a given release:
 * the latest ledger entry whose `since` is not newer than the release. A
 * status can move in any direction between entries; UNSUPPORTED followed by a
 * later SUPPORTED entry resolves to SUPPORTED from that release on.
 *
 * Whether an UNSUPPORTED status blocks usage is the caller's decision.
 */

import { UnsupportedVersionError } from '../errors/profileErrors.js';
import { ProfileTypeSchema } from '../schema/profileTypeSchema.js';
import { SupportStatus, SupportStatusEntry } from '../schema/supportStatus.js';
import { compareReleases, isRelease } from '../schema/versions.js';

export interface ResolvedSupportStatus {
    readonly status: SupportStatus;
    readonly since: string;
}

/**
 * @throws UnsupportedVersionError when the release predates every entry or is malformed
 */
export function resolveSupportStatus(schema: ProfileTypeSchema, referenceRelease: string): ResolvedSupportStatus {
    if (!isRelease(referenceRelease)) {
        throw new UnsupportedVersionError(schema.typeName, schema.version, referenceRelease, 'malformed release identifier');
    }

    let resolved: SupportStatusEntry | undefined;
    for (const entry of schema.supportStatus) {
        if (compareReleases(entry.since, referenceRelease) > 0) {
            continue;
        }
        if (!resolved || compareReleases(entry.since, resolved.since) > 0) {
            resolved = entry;
        }
    }

    if (!resolved) {
        const earliest = schema.supportStatus[0]?.since;
        throw new UnsupportedVersionError(
            schema.typeName,
            schema.version,
            referenceRelease,
            earliest === undefined ? 'no support status recorded' : `first available in release ${earliest}`
        );
    }

    return Object.freeze({ status: resolved.status, since: resolved.since });
}
