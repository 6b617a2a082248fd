export function normalizeMac(mac: string): string {
  return mac.toLowerCase().replace(/[^a-f0-9]/g, '').replace(/(.{2})/g, '$1:').slice(0, 17);
}

export function isValidMac(mac: string): boolean {
  const normalized = mac.replace(/[^a-fA-F0-9]/g, '');
  return normalized.length === 12 && /^[a-fA-F0-9]+$/.test(normalized);
}

/**
 * Normalize a MAC, or return null when the input is not a MAC at all.
 */
export function parseMac(value: string): string | null {
  return isValidMac(value) ? normalizeMac(value) : null;
}
