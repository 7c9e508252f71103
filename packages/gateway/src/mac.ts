import { InvalidMacError } from './errors';

const MAC_PATTERN = /^([0-9a-f]{2})([:-][0-9a-f]{2}){5}$/i;

export type Mac = string;

export const isMac = (value: string): boolean => MAC_PATTERN.test(value.trim());

/** Lowercase, colon separated. Throws on anything that is not six hex octets. */
export const canonicalMac = (value: string): Mac => {
  const trimmed = value.trim();
  if (!MAC_PATTERN.test(trimmed)) {
    throw new InvalidMacError(value);
  }
  return trimmed.toLowerCase().replace(/-/g, ':');
};

export const tryCanonicalMac = (value: string | undefined | null): Mac | undefined => {
  if (!value || !isMac(value)) {
    return undefined;
  }
  return canonicalMac(value);
};

export const displayMac = (mac: Mac) => mac.toUpperCase();
