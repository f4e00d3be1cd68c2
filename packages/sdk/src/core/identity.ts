/**
 * Identities and asset identifiers
 *
 * Parties and assets are addressed by opaque strings (a public key, an
 * account address, a token symbol). The engine never interprets them beyond
 * equality and the null check below.
 */

/**
 * Identity of a party: requester, recipient, treasury, owner or custodian.
 */
export type Identity = string;

/**
 * Identifier of an asset type on the value-transfer service.
 */
export type AssetId = string;

/**
 * Quantity of an asset in its smallest unit.
 */
export type Amount = bigint;

/**
 * The all-zero identity. Treated as "no one".
 */
export const NULL_IDENTITY: Identity =
	"0x0000000000000000000000000000000000000000";

/**
 * True for the empty string and for {@link NULL_IDENTITY}.
 * Asset ids follow the same rule.
 */
export function isNullIdentity(value: string | null | undefined): boolean {
	if (value === null || value === undefined) return true;
	const trimmed = value.trim();
	return trimmed === "" || trimmed.toLowerCase() === NULL_IDENTITY;
}

/**
 * Parse a non-negative integer amount from a decimal string.
 *
 * @returns the amount, or `undefined` when the string is not a plain
 * base-10 integer
 */
export function parseAmount(value: string): Amount | undefined {
	if (!/^\d+$/.test(value)) return undefined;
	return BigInt(value);
}
