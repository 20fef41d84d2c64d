export function parseCookieHeader(header: string | undefined): Record<string, string> {
  if (header === undefined || header.trim() === '') {
    return {};
  }

  return header.split(';').reduce<Record<string, string>>((acc, part) => {
    const separator = part.indexOf('=');
    if (separator === -1) {
      return acc;
    }
    const key = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (key !== '' && !Object.hasOwn(acc, key)) {
      acc[key] = value;
    }
    return acc;
  }, {});
}

export function readSessionToken(
  header: string | undefined,
  cookieName: string
): string | null {
  const value = parseCookieHeader(header)[cookieName];
  if (value === undefined || value === '') {
    return null;
  }
  return value;
}
