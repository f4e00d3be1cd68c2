/**
 * Copy of `value` where every bigint is replaced by its decimal string, so
 * it can go through JSON.
 */
export function toJsonSafe(value: unknown): unknown {
	if (typeof value === "bigint") return value.toString();
	if (Array.isArray(value)) return value.map(toJsonSafe);
	if (value !== null && typeof value === "object") {
		return Object.fromEntries(
			Object.entries(value).map(([key, v]) => [key, toJsonSafe(v)]),
		);
	}
	return value;
}
