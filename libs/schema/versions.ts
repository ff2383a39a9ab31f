/**
 * Ordering for profile type versions and platform releases.
 *
 * Schema versions are `major.minor` without leading zeros ("1.0", "1.12"),
 * so every version has one spelling. Release identifiers are
 * dot-separated integers ("2016.04", "2017.1.2"); they compare segment by
 * segment and missing trailing segments count as zero. Every number is at
 * most 15 digits long, so it stays exact as a JavaScript number.
 */

const SCHEMA_VERSION_PATTERN = /^(0|[1-9]\d{0,14})\.(0|[1-9]\d{0,14})$/;
const RELEASE_PATTERN = /^\d{1,15}(\.\d{1,15})*$/;

export interface SchemaVersion {
    readonly major: number;
    readonly minor: number;
}

export function parseSchemaVersion(version: string): SchemaVersion | null {
    const match = SCHEMA_VERSION_PATTERN.exec(version);
    if (!match) {
        return null;
    }
    return { major: Number(match[1]), minor: Number(match[2]) };
}

export function isSchemaVersion(version: string): boolean {
    return parseSchemaVersion(version) !== null;
}

/**
 * Numeric `major.minor` comparison, so "1.10" sorts after "1.9".
 * @throws RangeError on a malformed version
 */
export function compareSchemaVersions(a: string, b: string): number {
    const left = parseSchemaVersion(a);
    const right = parseSchemaVersion(b);
    if (!left || !right) {
        throw new RangeError(`Cannot compare malformed schema versions '${a}' and '${b}'`);
    }
    return left.major - right.major || left.minor - right.minor;
}

export function parseRelease(release: string): number[] | null {
    if (!RELEASE_PATTERN.test(release)) {
        return null;
    }
    return release.split('.').map(Number);
}

export function isRelease(release: string): boolean {
    return parseRelease(release) !== null;
}

/**
 * @throws RangeError on a malformed release identifier
 */
export function compareReleases(a: string, b: string): number {
    const left = parseRelease(a);
    const right = parseRelease(b);
    if (!left || !right) {
        throw new RangeError(`Cannot compare malformed releases '${a}' and '${b}'`);
    }

    const length = Math.max(left.length, right.length);
    for (let i = 0; i < length; i++) {
        const diff = (left[i] ?? 0) - (right[i] ?? 0);
        if (diff !== 0) {
            return diff;
        }
    }
    return 0;
}
