/**
 * Freezes a JSON-like value and everything reachable from it.
 * Expects: values are plain objects/arrays without cycles.
 */
export function freezeDeep<T>(value: T): T {
    if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
        return value;
    }
    const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
    Object.freeze(value);
    for (const child of children) {
        freezeDeep(child);
    }
    return value;
}
