export interface RepositoryRef {
  owner: string;
  name: string;
}

export interface ParseRepositoryRefOptions {
  /**
   * Hosts accepted for URL identifiers. An empty or missing list accepts any host and
   * reads owner/name from the first two path segments.
   */
  allowedHosts?: string[];
}

export const EMPTY_REPOSITORY_REF: Readonly<RepositoryRef> = Object.freeze({ owner: "", name: "" });

export const INVALID_REPOSITORY_MESSAGE =
  "Error: Invalid repository format. Expected 'owner/repo' or a valid GitHub URL.";

const emptyRef = (): RepositoryRef => ({ ...EMPTY_REPOSITORY_REF });

const isUrlIdentifier = (value: string): boolean =>
  value.startsWith("http://") || value.startsWith("https://");

const parseUrlIdentifier = (value: string, allowedHosts: string[]): RepositoryRef => {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return emptyRef();
  }
  if (allowedHosts.length && !allowedHosts.includes(url.hostname.toLowerCase())) {
    return emptyRef();
  }
  const segments = url.pathname.split("/");
  if (segments.length < 3) return emptyRef();
  const owner = segments[1] ?? "";
  const name = segments[2] ?? "";
  if (!owner || !name) return emptyRef();
  return { owner, name };
};

export const parseRepositoryRef = (
  identifier: string,
  options: ParseRepositoryRefOptions = {},
): RepositoryRef => {
  const value = identifier.trim();
  if (!value) return emptyRef();
  if (isUrlIdentifier(value)) {
    const allowedHosts = (options.allowedHosts ?? []).map((host) => host.toLowerCase());
    return parseUrlIdentifier(value, allowedHosts);
  }
  const segments = value.split("/");
  if (segments.length !== 2) return emptyRef();
  const [owner, name] = segments;
  if (!owner || !name) return emptyRef();
  return { owner, name };
};

export const isRepositoryRefValid = (ref: RepositoryRef): boolean =>
  ref.owner.length > 0 && ref.name.length > 0;

export const formatRepositoryUrl = (ref: RepositoryRef): string =>
  `https://github.com/${ref.owner}/${ref.name}`;
