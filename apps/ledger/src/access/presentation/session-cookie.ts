export const SESSION_COOKIE_NAME = 'groupvault_session';

export const parseCookies = (header: string | undefined): Record<string, string> => {
  if (!header) return {};
  return header.split(';').reduce<Record<string, string>>((acc, pair) => {
    const [rawName, ...rest] = pair.trim().split('=');
    if (!rawName || rest.length === 0) return acc;
    acc[decodeURIComponent(rawName)] = decodeURIComponent(rest.join('='));
    return acc;
  }, {});
};

/** Header token first, then the session cookie. */
export const resolveSessionToken = (
  headerValue: string | string[] | undefined,
  cookieHeader: string | undefined
): string | undefined => {
  if (typeof headerValue === 'string') return headerValue;
  if (Array.isArray(headerValue)) return headerValue[0];
  return parseCookies(cookieHeader)[SESSION_COOKIE_NAME];
};
