export const toOptionalNumber = (value: unknown): number | undefined => {
    if (typeof value === "number" && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === "string") {
        const trimmed = value.trim();
        if (trimmed !== "") {
            const parsed = Number(trimmed);
            if (Number.isFinite(parsed)) {
                return parsed;
            }
        }
    }
    return undefined;
};

/**
 * Rounds the scaled float to the nearest integer, ties to even, so
 * 0.125 -> 0.12 and 0.375 -> 0.38 at two decimals.
 */
export const roundTo = (value: number, decimals: number): number => {
    const factor = 10 ** decimals;
    const scaled = value * factor;
    const floor = Math.floor(scaled);
    const diff = scaled - floor;
    if (diff > 0.5) {
        return (floor + 1) / factor;
    }
    if (diff < 0.5) {
        return floor / factor;
    }
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
};

export const median = (values: readonly number[]): number | undefined => {
    if (!values.length) {
        return undefined;
    }
    const sorted = values.slice().sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0
        ? (sorted[mid - 1] + sorted[mid]) / 2
        : sorted[mid];
};

export const clamp = (value: number, min: number, max: number): number =>
    Math.min(max, Math.max(min, value));
