import { InvalidAddressFormat } from './errors.js';

// Sanity check only, not RFC 5322
const EMAIL_PATTERN = '[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\\.[a-zA-Z0-9-.]+';

const emailRegex = new RegExp(`^${EMAIL_PATTERN}$`);
const formattedAddressRegex = new RegExp(`^([^,<]+)<(${EMAIL_PATTERN})>$`);

export interface ParsedAddress {
  address: string;
  name?: string;
}

export function isEmailAddress(value: string): boolean {
  return emailRegex.test(value);
}

export function formatAddress(address: string, name?: string): string {
  if (name === undefined) return address;
  return `${name} <${address}>`;
}

/**
 * Splits `"email@example.com"` or `"My Name <email@example.com>"` into its parts.
 * Throws InvalidAddressFormat for anything else.
 */
export function parseAddress(formatted: string): ParsedAddress {
  if (emailRegex.test(formatted)) {
    return { address: formatted };
  }

  const match = formattedAddressRegex.exec(formatted);
  if (match) {
    const [, name, address] = match;
    return { address: address.trim(), name: name.trim() };
  }

  throw new InvalidAddressFormat(formatted);
}
