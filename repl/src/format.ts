export function formatResult(value: number, precision: number): string {
    if (!Number.isFinite(value)) {
        return String(value);
    }

    const fixed = value.toFixed(precision);
    // toFixed switches to exponent notation from 1e21 on
    if (fixed.includes("e") || !fixed.includes(".")) {
        return fixed;
    }

    const trimmed = fixed.replace(/0+$/, "").replace(/\.$/, "");
    if (trimmed === "0" || trimmed === "-0") {
        // a non-zero value below the precision keeps its own digits
        return value === 0 ? "0" : String(value);
    }
    return trimmed;
}
