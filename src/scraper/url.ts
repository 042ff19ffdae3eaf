/**
 * Repair the usual ways a pasted URL goes wrong and assume https when no
 * scheme is given.
 */
export function normalizeUrl(raw: string): string {
  if (!raw) return raw;

  let url = raw.trim().replace(/\\/g, '/');
  url = url.replace(/^(https?):\/([^/])/i, '$1://$2'); // http:/x
  url = url.replace(/^(https?):\/\/\/*/i, '$1://'); // http:////x
  url = url.replace(/^(https?)(\/\/)/i, '$1://'); // https//x
  url = url.replace(/^wwwhttps?:\/\//i, 'https://');

  if (/^www\./i.test(url)) {
    url = `https://${url}`;
  }
  if (!/^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(url)) {
    url = `https://${url}`;
  }
  return url.replace(/^(https?:\/\/)\/*/i, '$1');
}

export function isValidUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== '';
}
