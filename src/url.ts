// URL helpers shared by the API client and the OAuth strategy

export function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export function withoutLeadingSlashes(path: string): string {
  return path.replace(/^\/+/, '');
}
