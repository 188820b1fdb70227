// src/utils/address.ts

/**
 * '10.0.0.2/8' -> '10.0.0.2'
 */
export function stripPrefix(address: string): string {
	return address.split('/')[0] ?? address;
}
